import type { NextFunction, Request, Response } from "express";
import { AuthenticationError } from "../utils/errors.js";

export const requireAuth = (req: Request, res: Response, next: NextFunction) => {
  if (!req.isAuthenticated?.() || !req.user) {
    return res.status(401).json({ message: "Authentication required." });
  }

  next();
};

/** The signed-in user, or null for anonymous readers. */
export const optionalUser = (req: Request) => (req.isAuthenticated?.() && req.user ? req.user : null);

export const currentUser = (req: Request) => {
  const user = optionalUser(req);
  if (!user) {
    throw new AuthenticationError();
  }
  return user;
};

import type { Request } from "express";
import { Router } from "express";
import { compare, hash } from "bcryptjs";
import { eq, or } from "drizzle-orm";
import { db } from "../config/db.js";
import { PASSWORD_HASH_ROUNDS, SESSION_COOKIE } from "../constants.js";
import { users, type UserRecord } from "../db/schema.js";
import { optionalUser } from "../middleware/auth.js";
import { toUserView } from "../services/users.js";
import { asyncHandler } from "../utils/async-handler.js";
import { isUniqueViolation } from "../utils/db-errors.js";
import { ValidationError } from "../utils/errors.js";
import { loginSchema, signupSchema } from "./schemas.js";

export const authRouter = Router();

const logIn = (req: Request, user: UserRecord) =>
  new Promise<void>((resolve, reject) => {
    req.login(user, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

authRouter.get("/me", (req, res) => {
  const user = optionalUser(req);
  if (!user) {
    return res.json({ authenticated: false, user: null });
  }

  res.json({ authenticated: true, user: toUserView(user, false) });
});

authRouter.post(
  "/signup",
  asyncHandler(async (req, res) => {
    const payload = signupSchema.parse(req.body);

    const existing = await db.query.users.findFirst({
      where: or(eq(users.email, payload.email), eq(users.username, payload.username)),
      columns: { email: true },
    });
    if (existing) {
      throw existing.email === payload.email
        ? new ValidationError("email", "A user with this email already exists.")
        : new ValidationError("username", "A user with this username already exists.");
    }

    const passwordHash = await hash(payload.password, PASSWORD_HASH_ROUNDS);

    let user: UserRecord;
    try {
      [user] = await db
        .insert(users)
        .values({
          email: payload.email,
          username: payload.username,
          firstName: payload.firstName,
          lastName: payload.lastName,
          passwordHash,
        })
        .returning();
    } catch (error) {
      if (isUniqueViolation(error, "users_email_unique")) {
        throw new ValidationError("email", "A user with this email already exists.");
      }
      if (isUniqueViolation(error, "users_username_unique")) {
        throw new ValidationError("username", "A user with this username already exists.");
      }
      throw error;
    }

    await logIn(req, user);

    res.status(201).json({ authenticated: true, user: toUserView(user, false) });
  }),
);

authRouter.post(
  "/login",
  asyncHandler(async (req, res) => {
    const payload = loginSchema.parse(req.body);

    const user = await db.query.users.findFirst({ where: eq(users.email, payload.email) });
    if (!user) {
      return res.status(401).json({ message: "Invalid email or password." });
    }

    const valid = await compare(payload.password, user.passwordHash);
    if (!valid) {
      return res.status(401).json({ message: "Invalid email or password." });
    }

    await logIn(req, user);

    res.json({ authenticated: true, user: toUserView(user, false) });
  }),
);

authRouter.post(
  "/logout",
  asyncHandler(async (req, res) => {
    await new Promise<void>((resolve, reject) => {
      req.logout((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    req.session.destroy(() => {
      res.clearCookie(SESSION_COOKIE);
      res.json({ message: "Logged out." });
    });
  }),
);

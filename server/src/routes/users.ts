import { Router } from "express";
import { compare, hash } from "bcryptjs";
import { eq } from "drizzle-orm";
import { db } from "../config/db.js";
import { PASSWORD_HASH_ROUNDS } from "../constants.js";
import { users } from "../db/schema.js";
import { currentUser, optionalUser, requireAuth } from "../middleware/auth.js";
import { listSubscriptions, parseRecipesLimit, subscribe, unsubscribe } from "../services/subscriptions.js";
import { getUserView, listUserViews, removeAvatar, replaceAvatar } from "../services/users.js";
import { asyncHandler } from "../utils/async-handler.js";
import { ValidationError } from "../utils/errors.js";
import { paginationQuerySchema, toPage } from "../utils/pagination.js";
import { readIdParam } from "../utils/params.js";
import { avatarSchema, setPasswordSchema } from "./schemas.js";

export const userRouter = Router();

const USER_NOT_FOUND = "User not found.";

userRouter.get(
  "/",
  asyncHandler(async (req, res) => {
    const page = paginationQuerySchema.parse(req.query);
    const { total, results } = await listUserViews(optionalUser(req)?.id ?? null, page);

    res.json(toPage(req, page, total, results));
  }),
);

userRouter.get(
  "/me",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    res.json(await getUserView(user.id, user.id));
  }),
);

userRouter.put(
  "/me/avatar",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const { avatar } = avatarSchema.parse(req.body);

    res.json(await replaceAvatar(user, avatar));
  }),
);

userRouter.delete(
  "/me/avatar",
  requireAuth,
  asyncHandler(async (req, res) => {
    await removeAvatar(currentUser(req));
    res.status(204).send();
  }),
);

userRouter.post(
  "/set_password",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const payload = setPasswordSchema.parse(req.body);

    const valid = await compare(payload.currentPassword, user.passwordHash);
    if (!valid) {
      throw new ValidationError("currentPassword", "Current password is incorrect.");
    }

    const passwordHash = await hash(payload.newPassword, PASSWORD_HASH_ROUNDS);
    await db.update(users).set({ passwordHash }).where(eq(users.id, user.id));

    res.status(204).send();
  }),
);

userRouter.get(
  "/subscriptions",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const page = paginationQuerySchema.parse(req.query);
    const { total, results } = await listSubscriptions(user.id, page, parseRecipesLimit(req.query.recipes_limit));

    res.json(toPage(req, page, total, results));
  }),
);

userRouter.get(
  "/:id",
  asyncHandler(async (req, res) => {
    const userId = readIdParam(req.params.id, USER_NOT_FOUND);
    res.json(await getUserView(userId, optionalUser(req)?.id ?? null));
  }),
);

userRouter.post(
  "/:id/subscribe",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const authorId = readIdParam(req.params.id, USER_NOT_FOUND);
    const author = await subscribe(user.id, authorId, parseRecipesLimit(req.query.recipes_limit));

    res.status(201).json(author);
  }),
);

userRouter.delete(
  "/:id/subscribe",
  requireAuth,
  asyncHandler(async (req, res) => {
    const user = currentUser(req);
    const authorId = readIdParam(req.params.id, USER_NOT_FOUND);
    await unsubscribe(user.id, authorId);

    res.status(204).send();
  }),
);

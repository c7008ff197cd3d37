import { and, asc, count, eq } from "drizzle-orm";
import { db } from "../config/db.js";
import { MAX_ROW_ID } from "../constants.js";
import { subscriptions, users } from "../db/schema.js";
import { DuplicateError, NotFoundError } from "../utils/errors.js";
import { pageOffset, type PageRequest } from "../utils/pagination.js";
import { canSubscribe } from "../utils/permissions.js";
import { loadAuthorViews } from "./users.js";

/**
 * Only an all-digit value within the LIMIT range truncates the preview;
 * anything else means "no limit".
 */
export const parseRecipesLimit = (value: unknown) => {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    return undefined;
  }

  const limit = Number(raw);
  return Number.isSafeInteger(limit) && limit <= MAX_ROW_ID ? limit : undefined;
};

const assertUserExists = async (userId: number) => {
  const user = await db.query.users.findFirst({
    where: eq(users.id, userId),
    columns: { id: true },
  });

  if (!user) {
    throw new NotFoundError("User not found.");
  }
};

export const subscribe = async (subscriberId: number, authorId: number, recipesLimit?: number) => {
  await assertUserExists(authorId);

  if (!canSubscribe({ subscriberId, authorId })) {
    throw new DuplicateError("You cannot subscribe to yourself.");
  }

  const inserted = await db
    .insert(subscriptions)
    .values({ subscriberId, authorId })
    .onConflictDoNothing()
    .returning({ id: subscriptions.id });

  if (inserted.length === 0) {
    throw new DuplicateError("You are already subscribed to this user.");
  }

  const [author] = await loadAuthorViews([authorId], subscriberId, recipesLimit);
  return author;
};

export const unsubscribe = async (subscriberId: number, authorId: number) => {
  await assertUserExists(authorId);

  const removed = await db
    .delete(subscriptions)
    .where(and(eq(subscriptions.subscriberId, subscriberId), eq(subscriptions.authorId, authorId)))
    .returning({ id: subscriptions.id });

  if (removed.length === 0) {
    throw new NotFoundError("You were not subscribed to this user.");
  }
};

export const listSubscriptions = async (subscriberId: number, page: PageRequest, recipesLimit?: number) => {
  const [{ value: total }] = await db
    .select({ value: count() })
    .from(subscriptions)
    .where(eq(subscriptions.subscriberId, subscriberId));

  const authorRows = await db
    .select({ id: subscriptions.authorId })
    .from(subscriptions)
    .innerJoin(users, eq(users.id, subscriptions.authorId))
    .where(eq(subscriptions.subscriberId, subscriberId))
    .orderBy(asc(users.email))
    .limit(page.limit)
    .offset(pageOffset(page));

  return {
    total,
    results: await loadAuthorViews(
      authorRows.map((row) => row.id),
      subscriberId,
      recipesLimit,
    ),
  };
};

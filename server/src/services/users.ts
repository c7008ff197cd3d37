import { asc, count, desc, eq, inArray } from "drizzle-orm";
import { db } from "../config/db.js";
import { recipes, users, type UserRecord } from "../db/schema.js";
import { NotFoundError } from "../utils/errors.js";
import { pageOffset, type PageRequest } from "../utils/pagination.js";
import { discardImage, mediaUrl, storeImage } from "./images.js";

export type UserView = {
  id: number;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  avatar: string | null;
  isSubscribed: boolean;
};

export type MinifiedRecipe = {
  id: number;
  name: string;
  image: string | null;
  cookingTime: number;
};

export type AuthorView = UserView & {
  recipes: MinifiedRecipe[];
  recipesCount: number;
};

type UserFields = Pick<UserRecord, "id" | "email" | "username" | "firstName" | "lastName" | "avatar">;

export const toUserView = (user: UserFields, isSubscribed: boolean): UserView => ({
  id: user.id,
  email: user.email,
  username: user.username,
  firstName: user.firstName,
  lastName: user.lastName,
  avatar: mediaUrl(user.avatar),
  isSubscribed,
});

export const toMinifiedRecipe = (recipe: { id: number; name: string; image: string; cookingTime: number }): MinifiedRecipe => ({
  id: recipe.id,
  name: recipe.name,
  image: mediaUrl(recipe.image),
  cookingTime: recipe.cookingTime,
});

export const getUserView = async (userId: number, viewerId: number | null) => {
  const user = await db.query.users.findFirst({
    where: eq(users.id, userId),
    with: {
      subscribers: {
        columns: { subscriberId: true },
        where: (subscription, { eq: equals, sql }) =>
          viewerId === null ? sql`false` : equals(subscription.subscriberId, viewerId),
      },
    },
  });

  if (!user) {
    throw new NotFoundError("User not found.");
  }

  return toUserView(user, user.subscribers.length > 0);
};

export const listUserViews = async (viewerId: number | null, page: PageRequest) => {
  const [{ value: total }] = await db.select({ value: count() }).from(users);
  const rows = await db.query.users.findMany({
    orderBy: [asc(users.email)],
    limit: page.limit,
    offset: pageOffset(page),
    with: {
      subscribers: {
        columns: { subscriberId: true },
        where: (subscription, { eq: equals, sql }) =>
          viewerId === null ? sql`false` : equals(subscription.subscriberId, viewerId),
      },
    },
  });

  return {
    total,
    results: rows.map((user) => toUserView(user, user.subscribers.length > 0)),
  };
};

/**
 * Author cards with their newest recipes, in the order of `authorIds`.
 * `recipesLimit` truncates the preview only; `recipesCount` is always the full total.
 */
export const loadAuthorViews = async (
  authorIds: number[],
  viewerId: number | null,
  recipesLimit?: number,
): Promise<AuthorView[]> => {
  if (authorIds.length === 0) {
    return [];
  }

  const rows = await db.query.users.findMany({
    where: inArray(users.id, authorIds),
    with: {
      recipes: {
        columns: { id: true, name: true, image: true, cookingTime: true },
        orderBy: (recipe) => [desc(recipe.createdAt), desc(recipe.id)],
        limit: recipesLimit,
      },
      subscribers: {
        columns: { subscriberId: true },
        where: (subscription, { eq: equals, sql }) =>
          viewerId === null ? sql`false` : equals(subscription.subscriberId, viewerId),
      },
    },
  });

  const counts = await db
    .select({ authorId: recipes.authorId, value: count() })
    .from(recipes)
    .where(inArray(recipes.authorId, authorIds))
    .groupBy(recipes.authorId);
  const countByAuthor = new Map(counts.map((row) => [row.authorId, row.value]));

  const byId = new Map(rows.map((row) => [row.id, row]));
  return authorIds.flatMap((id) => {
    const author = byId.get(id);
    if (!author) {
      return [];
    }

    return [
      {
        ...toUserView(author, author.subscribers.length > 0),
        recipes: author.recipes.map(toMinifiedRecipe),
        recipesCount: countByAuthor.get(id) ?? 0,
      },
    ];
  });
};

/** Stores a new avatar and drops the file it replaces. */
export const replaceAvatar = async (user: Pick<UserRecord, "id" | "avatar">, dataUri: string) => {
  const avatar = await storeImage(dataUri, "users/avatars", "avatar");

  try {
    await db.update(users).set({ avatar }).where(eq(users.id, user.id));
  } catch (error) {
    await discardImage(avatar);
    throw error;
  }

  await discardImage(user.avatar);
  return { avatar: mediaUrl(avatar) };
};

export const removeAvatar = async (user: Pick<UserRecord, "id" | "avatar">) => {
  await db.update(users).set({ avatar: null }).where(eq(users.id, user.id));
  await discardImage(user.avatar);
};

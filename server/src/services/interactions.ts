import { and, eq } from "drizzle-orm";
import { db } from "../config/db.js";
import { favorites, recipes, shoppingCartItems } from "../db/schema.js";
import { DuplicateError, NotFoundError } from "../utils/errors.js";
import { toMinifiedRecipe } from "./users.js";

export type MembershipKind = "favorite" | "shoppingCart";

type MembershipStore = {
  label: string;
  insert: (userId: number, recipeId: number) => Promise<Array<{ id: number }>>;
  remove: (userId: number, recipeId: number) => Promise<Array<{ id: number }>>;
};

// The unique (user, recipe) constraint decides duplicates: a conflicting
// insert returns no row, so two racing adds yield exactly one success.
const stores: Record<MembershipKind, MembershipStore> = {
  favorite: {
    label: "favorites",
    insert: (userId, recipeId) =>
      db.insert(favorites).values({ userId, recipeId }).onConflictDoNothing().returning({ id: favorites.id }),
    remove: (userId, recipeId) =>
      db
        .delete(favorites)
        .where(and(eq(favorites.userId, userId), eq(favorites.recipeId, recipeId)))
        .returning({ id: favorites.id }),
  },
  shoppingCart: {
    label: "the shopping cart",
    insert: (userId, recipeId) =>
      db
        .insert(shoppingCartItems)
        .values({ userId, recipeId })
        .onConflictDoNothing()
        .returning({ id: shoppingCartItems.id }),
    remove: (userId, recipeId) =>
      db
        .delete(shoppingCartItems)
        .where(and(eq(shoppingCartItems.userId, userId), eq(shoppingCartItems.recipeId, recipeId)))
        .returning({ id: shoppingCartItems.id }),
  },
};

const findRecipe = async (recipeId: number) => {
  const recipe = await db.query.recipes.findFirst({
    where: eq(recipes.id, recipeId),
    columns: { id: true, name: true, image: true, cookingTime: true },
  });

  if (!recipe) {
    throw new NotFoundError("Recipe not found.");
  }

  return recipe;
};

export const addRecipeTo = async (kind: MembershipKind, userId: number, recipeId: number) => {
  const recipe = await findRecipe(recipeId);
  const store = stores[kind];

  const inserted = await store.insert(userId, recipeId);
  if (inserted.length === 0) {
    throw new DuplicateError(`Recipe already added to ${store.label}.`);
  }

  return toMinifiedRecipe(recipe);
};

export const removeRecipeFrom = async (kind: MembershipKind, userId: number, recipeId: number) => {
  await findRecipe(recipeId);
  const store = stores[kind];

  const removed = await store.remove(userId, recipeId);
  if (removed.length === 0) {
    throw new NotFoundError(`Recipe was not added to ${store.label}.`);
  }
};


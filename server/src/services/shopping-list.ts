import { asc, eq, sql } from "drizzle-orm";
import { db } from "../config/db.js";
import { ingredients, recipeIngredients, shoppingCartItems } from "../db/schema.js";

export type ShoppingListRow = {
  name: string;
  measurementUnit: string;
  totalAmount: number;
};

/**
 * Sums every ingredient line of every recipe in the user's cart, grouped by
 * (name, unit) and ordered by name then unit.
 */
export const aggregateShoppingList = async (userId: number): Promise<ShoppingListRow[]> =>
  db
    .select({
      name: ingredients.name,
      measurementUnit: ingredients.measurementUnit,
      totalAmount: sql<number>`sum(${recipeIngredients.amount})`.mapWith(Number),
    })
    .from(recipeIngredients)
    .innerJoin(ingredients, eq(ingredients.id, recipeIngredients.ingredientId))
    .innerJoin(shoppingCartItems, eq(shoppingCartItems.recipeId, recipeIngredients.recipeId))
    .where(eq(shoppingCartItems.userId, userId))
    .groupBy(ingredients.name, ingredients.measurementUnit)
    .orderBy(asc(ingredients.name), asc(ingredients.measurementUnit));

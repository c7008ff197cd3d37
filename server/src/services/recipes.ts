import { eq, inArray } from "drizzle-orm";
import { db, type Transaction } from "../config/db.js";
import { LIMITS, MAX_ROW_ID, SHORT_LINK_MAX_ATTEMPTS } from "../constants.js";
import { ingredients, recipeIngredients, recipes, recipeTags, tags } from "../db/schema.js";
import { isUniqueViolation } from "../utils/db-errors.js";
import { NotFoundError, PermissionError, ValidationError } from "../utils/errors.js";
import { canDeleteRecipe, canEditRecipe } from "../utils/permissions.js";
import { discardImage, storeImage } from "./images.js";
import { generateShortLinkCode } from "./short-link.js";

export type RecipeIngredientInput = {
  id: number;
  amount: number;
};

export type RecipeDraft = {
  name: string;
  text: string;
  image: string;
  cookingTime: number;
  tags: number[];
  ingredients: RecipeIngredientInput[];
};

export type RecipeUpdateDraft = Partial<Pick<RecipeDraft, "name" | "text" | "image" | "cookingTime">>
  & Pick<RecipeDraft, "tags" | "ingredients">;

const inRange = (value: number, min: number, max: number) => Number.isInteger(value) && value >= min && value <= max;

const hasDuplicates = (values: number[]) => new Set(values).size !== values.length;

export const validateRecipeDraft = (draft: RecipeUpdateDraft) => {
  if (draft.ingredients.length === 0) {
    throw new ValidationError("ingredients", "At least one ingredient is required.");
  }
  if (hasDuplicates(draft.ingredients.map((item) => item.id))) {
    throw new ValidationError("ingredients", "Ingredients must not repeat.");
  }
  const outOfRange = draft.ingredients.find((item) => !inRange(item.amount, LIMITS.minAmount, LIMITS.maxAmount));
  if (outOfRange) {
    throw new ValidationError(
      "ingredients",
      `Amount for ingredient ${outOfRange.id} must be between ${LIMITS.minAmount} and ${LIMITS.maxAmount}.`,
    );
  }

  if (draft.tags.length === 0) {
    throw new ValidationError("tags", "At least one tag is required.");
  }
  if (hasDuplicates(draft.tags)) {
    throw new ValidationError("tags", "Tags must not repeat.");
  }

  if (draft.cookingTime !== undefined && !inRange(draft.cookingTime, LIMITS.minCookingTime, LIMITS.maxCookingTime)) {
    throw new ValidationError(
      "cookingTime",
      `Cooking time must be between ${LIMITS.minCookingTime} and ${LIMITS.maxCookingTime} minutes.`,
    );
  }
};

// Ids past the key range cannot name a row and would be rejected by the column type.
const storableIds = (ids: number[]) => ids.filter((id) => id <= MAX_ROW_ID);

const assertCatalogReferences = async (draft: RecipeUpdateDraft) => {
  const ingredientIds = draft.ingredients.map((item) => item.id);
  const lookupIngredientIds = storableIds(ingredientIds);
  const knownIngredients =
    lookupIngredientIds.length === 0
      ? []
      : await db.select({ id: ingredients.id }).from(ingredients).where(inArray(ingredients.id, lookupIngredientIds));
  const knownIngredientIds = new Set(knownIngredients.map((row) => row.id));
  const unknownIngredient = ingredientIds.find((id) => !knownIngredientIds.has(id));
  if (unknownIngredient !== undefined) {
    throw new ValidationError("ingredients", `Ingredient ${unknownIngredient} does not exist.`);
  }

  const lookupTagIds = storableIds(draft.tags);
  const knownTags =
    lookupTagIds.length === 0 ? [] : await db.select({ id: tags.id }).from(tags).where(inArray(tags.id, lookupTagIds));
  const knownTagIds = new Set(knownTags.map((row) => row.id));
  const unknownTag = draft.tags.find((id) => !knownTagIds.has(id));
  if (unknownTag !== undefined) {
    throw new ValidationError("tags", `Tag ${unknownTag} does not exist.`);
  }
};

type RecipeRowValues = Omit<typeof recipes.$inferInsert, "id" | "shortLink" | "createdAt">;

/**
 * Inserts the recipe row with a freshly sampled short link. Each attempt runs
 * in its own savepoint so a collision on the unique constraint only rolls back
 * that attempt, not the surrounding transaction.
 */
const insertWithShortLink = async (tx: Transaction, values: RecipeRowValues) => {
  for (let attempt = 1; attempt <= SHORT_LINK_MAX_ATTEMPTS; attempt += 1) {
    const shortLink = generateShortLinkCode();
    try {
      const [recipe] = await tx.transaction(async (savepoint) =>
        savepoint
          .insert(recipes)
          .values({ ...values, shortLink })
          .returning({ id: recipes.id, shortLink: recipes.shortLink }),
      );
      return recipe;
    } catch (error) {
      if (!isUniqueViolation(error, "recipes_short_link_unique")) {
        throw error;
      }
    }
  }

  throw new Error(`Could not allocate a unique short link after ${SHORT_LINK_MAX_ATTEMPTS} attempts.`);
};

const writeComposition = async (tx: Transaction, recipeId: number, draft: RecipeUpdateDraft) => {
  await tx.insert(recipeTags).values(draft.tags.map((tagId) => ({ recipeId, tagId })));
  await tx.insert(recipeIngredients).values(
    draft.ingredients.map((item) => ({
      recipeId,
      ingredientId: item.id,
      amount: item.amount,
    })),
  );
};

/** Validates, stores the image, then writes recipe, tags and ingredient lines in one transaction. */
export const createRecipe = async (authorId: number, draft: RecipeDraft) => {
  validateRecipeDraft(draft);
  await assertCatalogReferences(draft);

  const image = await storeImage(draft.image, "recipes/images");

  try {
    return await db.transaction(async (tx) => {
      const recipe = await insertWithShortLink(tx, {
        authorId,
        name: draft.name,
        text: draft.text,
        image,
        cookingTime: draft.cookingTime,
      });
      await writeComposition(tx, recipe.id, draft);
      return recipe;
    });
  } catch (error) {
    await discardImage(image);
    throw error;
  }
};

const findOwnedRecipe = async (recipeId: number) => {
  const recipe = await db.query.recipes.findFirst({
    where: eq(recipes.id, recipeId),
    columns: { id: true, authorId: true, image: true },
  });

  if (!recipe) {
    throw new NotFoundError("Recipe not found.");
  }

  return recipe;
};

/**
 * Replaces scalar fields, the tag set and the whole ingredient list. Old
 * composition rows are deleted before the new ones are inserted.
 */
export const updateRecipe = async (recipeId: number, actorId: number, draft: RecipeUpdateDraft) => {
  const existing = await findOwnedRecipe(recipeId);
  if (!canEditRecipe({ authorId: existing.authorId, userId: actorId })) {
    throw new PermissionError("You do not have permission to edit this recipe.");
  }

  validateRecipeDraft(draft);
  await assertCatalogReferences(draft);

  const image = draft.image === undefined ? existing.image : await storeImage(draft.image, "recipes/images");

  try {
    await db.transaction(async (tx) => {
      await tx
        .update(recipes)
        .set({
          name: draft.name,
          text: draft.text,
          cookingTime: draft.cookingTime,
          image,
        })
        .where(eq(recipes.id, recipeId));
      await tx.delete(recipeTags).where(eq(recipeTags.recipeId, recipeId));
      await tx.delete(recipeIngredients).where(eq(recipeIngredients.recipeId, recipeId));
      await writeComposition(tx, recipeId, draft);
    });
  } catch (error) {
    if (image !== existing.image) {
      await discardImage(image);
    }
    throw error;
  }

  if (image !== existing.image) {
    await discardImage(existing.image);
  }
};

export const deleteRecipe = async (recipeId: number, actorId: number) => {
  const existing = await findOwnedRecipe(recipeId);
  if (!canDeleteRecipe({ authorId: existing.authorId, userId: actorId })) {
    throw new PermissionError("You do not have permission to delete this recipe.");
  }

  await db.delete(recipes).where(eq(recipes.id, recipeId));
  await discardImage(existing.image);
};

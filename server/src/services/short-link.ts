import { randomInt } from "node:crypto";
import { eq } from "drizzle-orm";
import { db } from "../config/db.js";
import { env } from "../config/env.js";
import { LIMITS, SHORT_LINK_ALPHABET } from "../constants.js";
import { recipes } from "../db/schema.js";
import { NotFoundError } from "../utils/errors.js";

export const generateShortLinkCode = (length: number = LIMITS.shortLinkLength) => {
  let code = "";
  for (let index = 0; index < length; index += 1) {
    code += SHORT_LINK_ALPHABET[randomInt(SHORT_LINK_ALPHABET.length)];
  }
  return code;
};

export const shortLinkUrl = (code: string) => new URL(`/s/${code}/`, env.SERVER_URL).toString();

export const recipePageUrl = (recipeId: number) => new URL(`/recipes/${recipeId}/`, env.CLIENT_URL).toString();

export const resolveShortLink = async (code: string) => {
  const recipe = await db.query.recipes.findFirst({
    where: eq(recipes.shortLink, code),
    columns: { id: true },
  });

  if (!recipe) {
    throw new NotFoundError("Short link not found.");
  }

  return { recipeId: recipe.id, location: recipePageUrl(recipe.id) };
};

export const getRecipeShortLink = async (recipeId: number) => {
  const recipe = await db.query.recipes.findFirst({
    where: eq(recipes.id, recipeId),
    columns: { shortLink: true },
  });

  if (!recipe) {
    throw new NotFoundError("Recipe not found.");
  }

  return { "short-link": shortLinkUrl(recipe.shortLink) };
};

export const LIMITS = {
  emailLength: 254,
  usernameLength: 150,
  personNameLength: 150,
  tagNameLength: 32,
  tagSlugLength: 32,
  ingredientNameLength: 128,
  measurementUnitLength: 64,
  recipeNameLength: 256,
  minCookingTime: 1,
  maxCookingTime: 32000,
  minAmount: 1,
  maxAmount: 32000,
  shortLinkLength: 6,
} as const;

// Largest value a serial (int4) key or LIMIT takes.
export const MAX_ROW_ID = 2147483647;

export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export const SHORT_LINK_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
export const SHORT_LINK_MAX_ATTEMPTS = 10;

export const SESSION_COOKIE = "forkful.sid";
export const PASSWORD_HASH_ROUNDS = 12;

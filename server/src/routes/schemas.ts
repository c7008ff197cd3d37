import { z } from "zod";
import { LIMITS, MAX_ROW_ID, USERNAME_PATTERN } from "../constants.js";

// Body ids stay unbounded: one that cannot exist is reported as an unknown reference.
const idSchema = z.number().int().positive();

const idQuerySchema = z.coerce.number().int().positive().max(MAX_ROW_ID);

export const recipeIngredientSchema = z.object({
  id: idSchema,
  amount: z.number().int(),
});

export const recipeWriteSchema = z.object({
  ingredients: z.array(recipeIngredientSchema),
  tags: z.array(idSchema),
  image: z.string().min(1),
  name: z.string().trim().min(1).max(LIMITS.recipeNameLength),
  text: z.string().trim().min(1),
  cookingTime: z.number().int(),
});

export const recipeUpdateSchema = recipeWriteSchema.partial({
  image: true,
  name: true,
  text: true,
  cookingTime: true,
});

const flagSchema = z
  .enum(["0", "1", "true", "false"])
  .optional()
  .transform((value) => value === "1" || value === "true");

export const recipeListQuerySchema = z.object({
  author: idQuerySchema.optional(),
  tags: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value])),
  is_favorited: flagSchema,
  is_in_shopping_cart: flagSchema,
});

export const ingredientQuerySchema = z.object({
  name: z.string().optional(),
});

export const signupSchema = z.object({
  email: z.string().email().max(LIMITS.emailLength),
  username: z.string().min(1).max(LIMITS.usernameLength).regex(USERNAME_PATTERN, "Enter a valid username."),
  firstName: z.string().trim().min(1).max(LIMITS.personNameLength),
  lastName: z.string().trim().min(1).max(LIMITS.personNameLength),
  password: z.string().min(8).max(100),
});

export const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1).max(100),
});

export const setPasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(8).max(100),
});

export const avatarSchema = z.object({
  avatar: z.string().min(1),
});

import { asc, eq, ilike } from "drizzle-orm";
import { z } from "zod";
import { db } from "../config/db.js";
import { LIMITS } from "../constants.js";
import { ingredients, tags } from "../db/schema.js";
import { NotFoundError, ValidationError } from "../utils/errors.js";

export const listTags = () => db.select().from(tags).orderBy(asc(tags.name));

export const getTag = async (tagId: number) => {
  const tag = await db.query.tags.findFirst({ where: eq(tags.id, tagId) });
  if (!tag) {
    throw new NotFoundError("Tag not found.");
  }
  return tag;
};

const escapeLikePattern = (value: string) => value.replace(/[\\%_]/g, (character) => `\\${character}`);

/** Case-insensitive prefix match on the ingredient name; an empty prefix lists everything. */
export const listIngredients = (namePrefix?: string) => {
  const prefix = namePrefix?.trim();
  return db
    .select()
    .from(ingredients)
    .where(prefix ? ilike(ingredients.name, `${escapeLikePattern(prefix)}%`) : undefined)
    .orderBy(asc(ingredients.name), asc(ingredients.measurementUnit));
};

export const getIngredient = async (ingredientId: number) => {
  const ingredient = await db.query.ingredients.findFirst({ where: eq(ingredients.id, ingredientId) });
  if (!ingredient) {
    throw new NotFoundError("Ingredient not found.");
  }
  return ingredient;
};

export type IngredientEntry = {
  name: string;
  measurementUnit: string;
};

const ingredientEntrySchema = z
  .object({
    name: z.string().trim().min(1).max(LIMITS.ingredientNameLength),
    measurement_unit: z.string().trim().min(1).max(LIMITS.measurementUnitLength).optional(),
    measurementUnit: z.string().trim().min(1).max(LIMITS.measurementUnitLength).optional(),
  })
  .transform((entry, context) => {
    const measurementUnit = entry.measurementUnit ?? entry.measurement_unit;
    if (!measurementUnit) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: "measurement_unit is required." });
      return z.NEVER;
    }
    return { name: entry.name, measurementUnit };
  });

/**
 * Reads `[{ name, measurement_unit }]` JSON or `name,unit` CSV lines. For CSV
 * the unit is the text after the last comma, so names may contain commas.
 */
export const parseIngredientFile = (content: string, format: "json" | "csv"): IngredientEntry[] => {
  if (format === "json") {
    return z.array(ingredientEntrySchema).parse(JSON.parse(content));
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, index) => {
      const separator = line.lastIndexOf(",");
      if (separator <= 0) {
        throw new ValidationError("file", `Line ${index + 1} is not "name,unit".`);
      }
      return ingredientEntrySchema.parse({
        name: line.slice(0, separator).replace(/^"|"$/g, ""),
        measurementUnit: line.slice(separator + 1).replace(/^"|"$/g, ""),
      });
    });
};

const IMPORT_BATCH_SIZE = 500;

/** Inserts catalog entries, skipping (name, unit) pairs that already exist. */
export const importIngredients = async (entries: IngredientEntry[]) => {
  const distinct = [...new Map(entries.map((entry) => [`${entry.name}\u0000${entry.measurementUnit}`, entry])).values()];
  let inserted = 0;

  for (let start = 0; start < distinct.length; start += IMPORT_BATCH_SIZE) {
    const batch = distinct.slice(start, start + IMPORT_BATCH_SIZE);
    const rows = await db
      .insert(ingredients)
      .values(batch)
      .onConflictDoNothing()
      .returning({ id: ingredients.id });
    inserted += rows.length;
  }

  return { parsed: entries.length, inserted, skipped: entries.length - inserted };
};

import { db } from "../../src/config/db.js";
import { ingredients, tags, users } from "../../src/db/schema.js";
import { createRecipe, type RecipeDraft } from "../../src/services/recipes.js";

// 1x1 transparent PNG
export const PNG_DATA_URI =
  "data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=";

let sequence = 0;

export const createUser = async (overrides: Partial<typeof users.$inferInsert> = {}) => {
  sequence += 1;
  const [user] = await db
    .insert(users)
    .values({
      email: `cook${sequence}@example.com`,
      username: `cook${sequence}`,
      firstName: "Test",
      lastName: `Cook${sequence}`,
      passwordHash: "test-hash",
      ...overrides,
    })
    .returning();
  return user;
};

export const createTag = async (name: string, slug = name.toLowerCase()) => {
  const [tag] = await db.insert(tags).values({ name, slug }).returning();
  return tag;
};

export const createIngredient = async (name: string, measurementUnit: string) => {
  const [ingredient] = await db.insert(ingredients).values({ name, measurementUnit }).returning();
  return ingredient;
};

export const recipeDraft = (overrides: Partial<RecipeDraft> & Pick<RecipeDraft, "tags" | "ingredients">): RecipeDraft => ({
  name: "Test pancakes",
  text: "Mix and fry.",
  image: PNG_DATA_URI,
  cookingTime: 20,
  ...overrides,
});

export const createRecipeFor = (
  authorId: number,
  overrides: Partial<RecipeDraft> & Pick<RecipeDraft, "tags" | "ingredients">,
) => createRecipe(authorId, recipeDraft(overrides));

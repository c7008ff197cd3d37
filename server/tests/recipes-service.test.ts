import { count, eq } from "drizzle-orm";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { db } from "../src/config/db.js";
import type { PgTable } from "drizzle-orm/pg-core";
import { recipeIngredients, recipes, recipeTags } from "../src/db/schema.js";
import { getRecipeForUser } from "../src/services/recipe-access.js";
import { createRecipe, deleteRecipe, updateRecipe } from "../src/services/recipes.js";
import { NotFoundError, PermissionError, ValidationError } from "../src/utils/errors.js";
import { createIngredient, createRecipeFor, createTag, createUser, recipeDraft } from "./helpers/fixtures.js";
import { resetDatabase } from "./helpers/test-db.js";

vi.mock("../src/config/db.js", async () => {
  const { createTestDatabase } = await import("./helpers/test-db.js");
  return createTestDatabase();
});

const countRows = async (table: PgTable) => {
  const [{ value }] = await db.select({ value: count() }).from(table);
  return value;
};

describe("recipe aggregate", () => {
  beforeEach(async () => {
    await resetDatabase(db);
  });

  it("creates the recipe with its tags and ingredient lines", async () => {
    const author = await createUser();
    const breakfast = await createTag("Breakfast");
    const flour = await createIngredient("flour", "g");
    const milk = await createIngredient("milk", "ml");

    const created = await createRecipeFor(author.id, {
      tags: [breakfast.id],
      ingredients: [
        { id: flour.id, amount: 200 },
        { id: milk.id, amount: 300 },
      ],
    });

    expect(created.shortLink).toMatch(/^[A-Za-z0-9]{6}$/);

    const view = await getRecipeForUser(created.id, null);
    expect(view.name).toBe("Test pancakes");
    expect(view.author.id).toBe(author.id);
    expect(view.tags).toEqual([{ id: breakfast.id, name: "Breakfast", slug: "breakfast" }]);
    expect(view.ingredients).toEqual([
      { id: flour.id, name: "flour", measurementUnit: "g", amount: 200 },
      { id: milk.id, name: "milk", measurementUnit: "ml", amount: 300 },
    ]);
    expect(view.image).toMatch(/^http:\/\/localhost:4000\/media\/recipes\/images\/.+\.png$/);
    expect(view.isFavorited).toBe(false);
  });

  it("rejects drafts without ingredients or tags", async () => {
    const author = await createUser();
    const tag = await createTag("Lunch");
    const flour = await createIngredient("flour", "g");

    await expect(createRecipe(author.id, recipeDraft({ tags: [tag.id], ingredients: [] }))).rejects.toThrow(
      "At least one ingredient is required.",
    );
    await expect(
      createRecipe(author.id, recipeDraft({ tags: [], ingredients: [{ id: flour.id, amount: 1 }] })),
    ).rejects.toThrow("At least one tag is required.");
    expect(await countRows(recipes)).toBe(0);
  });

  it("rejects repeated ingredients and tags", async () => {
    const author = await createUser();
    const tag = await createTag("Lunch");
    const flour = await createIngredient("flour", "g");

    await expect(
      createRecipe(
        author.id,
        recipeDraft({
          tags: [tag.id],
          ingredients: [
            { id: flour.id, amount: 1 },
            { id: flour.id, amount: 2 },
          ],
        }),
      ),
    ).rejects.toThrow("Ingredients must not repeat.");
    await expect(
      createRecipe(author.id, recipeDraft({ tags: [tag.id, tag.id], ingredients: [{ id: flour.id, amount: 1 }] })),
    ).rejects.toThrow("Tags must not repeat.");
  });

  it("scopes range errors to the offending field", async () => {
    const author = await createUser();
    const tag = await createTag("Lunch");
    const flour = await createIngredient("flour", "g");

    const cookingTime = createRecipe(
      author.id,
      recipeDraft({ cookingTime: 0, tags: [tag.id], ingredients: [{ id: flour.id, amount: 1 }] }),
    );
    await expect(cookingTime).rejects.toMatchObject({ field: "cookingTime" });

    const amount = createRecipe(author.id, recipeDraft({ tags: [tag.id], ingredients: [{ id: flour.id, amount: 32001 }] }));
    await expect(amount).rejects.toThrow(`Amount for ingredient ${flour.id} must be between 1 and 32000.`);
  });

  it("rejects unknown catalog references", async () => {
    const author = await createUser();
    const tag = await createTag("Lunch");
    const flour = await createIngredient("flour", "g");

    await expect(
      createRecipe(author.id, recipeDraft({ tags: [tag.id], ingredients: [{ id: 999, amount: 1 }] })),
    ).rejects.toThrow("Ingredient 999 does not exist.");
    await expect(
      createRecipe(author.id, recipeDraft({ tags: [999], ingredients: [{ id: flour.id, amount: 1 }] })),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("treats ids past the key range as missing", async () => {
    const author = await createUser();
    const tag = await createTag("Lunch");

    await expect(
      createRecipe(author.id, recipeDraft({ tags: [tag.id], ingredients: [{ id: 3000000000, amount: 1 }] })),
    ).rejects.toMatchObject({ field: "ingredients", message: "Ingredient 3000000000 does not exist." });
  });

  it("replaces the tag set and ingredient list on update", async () => {
    const author = await createUser();
    const breakfast = await createTag("Breakfast");
    const dinner = await createTag("Dinner");
    const flour = await createIngredient("flour", "g");
    const sugar = await createIngredient("sugar", "g");
    const { id, shortLink } = await createRecipeFor(author.id, {
      tags: [breakfast.id],
      ingredients: [{ id: flour.id, amount: 200 }],
    });
    const before = await getRecipeForUser(id, null);

    await updateRecipe(id, author.id, {
      name: "Sweet dinner",
      tags: [dinner.id],
      ingredients: [{ id: sugar.id, amount: 50 }],
    });

    const after = await getRecipeForUser(id, null);
    expect(after.name).toBe("Sweet dinner");
    expect(after.text).toBe("Mix and fry.");
    expect(after.image).toBe(before.image);
    expect(after.tags.map((tag) => tag.slug)).toEqual(["dinner"]);
    expect(after.ingredients).toEqual([{ id: sugar.id, name: "sugar", measurementUnit: "g", amount: 50 }]);
    expect(await countRows(recipeIngredients)).toBe(1);
    expect(await countRows(recipeTags)).toBe(1);

    const [row] = await db.select({ shortLink: recipes.shortLink }).from(recipes).where(eq(recipes.id, id));
    expect(row.shortLink).toBe(shortLink);
  });

  it("only lets the author update or delete", async () => {
    const author = await createUser();
    const stranger = await createUser();
    const tag = await createTag("Lunch");
    const flour = await createIngredient("flour", "g");
    const { id } = await createRecipeFor(author.id, { tags: [tag.id], ingredients: [{ id: flour.id, amount: 1 }] });

    await expect(
      updateRecipe(id, stranger.id, { tags: [tag.id], ingredients: [{ id: flour.id, amount: 2 }] }),
    ).rejects.toBeInstanceOf(PermissionError);
    await expect(deleteRecipe(id, stranger.id)).rejects.toThrow("You do not have permission to delete this recipe.");
    await expect(deleteRecipe(id + 100, author.id)).rejects.toBeInstanceOf(NotFoundError);

    await deleteRecipe(id, author.id);
    expect(await countRows(recipes)).toBe(0);
    expect(await countRows(recipeIngredients)).toBe(0);
  });
});

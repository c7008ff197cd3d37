import { beforeEach, describe, expect, it, vi } from "vitest";
import { db } from "../src/config/db.js";
import { addRecipeTo } from "../src/services/interactions.js";
import { aggregateShoppingList } from "../src/services/shopping-list.js";
import { formatAmount, loadPdfFont, renderShoppingListPdf } from "../src/services/shopping-list-pdf.js";
import { createIngredient, createRecipeFor, createTag, createUser } from "./helpers/fixtures.js";
import { resetDatabase } from "./helpers/test-db.js";

vi.mock("../src/config/db.js", async () => {
  const { createTestDatabase } = await import("./helpers/test-db.js");
  return createTestDatabase();
});

const pdfText = (document: Buffer) => document.toString("latin1");

describe("shopping list aggregation", () => {
  beforeEach(async () => {
    await resetDatabase(db);
  });

  it("sums amounts per ingredient and unit across cart recipes", async () => {
    const author = await createUser();
    const shopper = await createUser();
    const tag = await createTag("Baking");
    const flour = await createIngredient("flour", "g");
    const sugar = await createIngredient("sugar", "g");
    const milk = await createIngredient("milk", "ml");

    const bread = await createRecipeFor(author.id, { tags: [tag.id], ingredients: [{ id: flour.id, amount: 200 }] });
    const cake = await createRecipeFor(author.id, {
      name: "Cake",
      tags: [tag.id],
      ingredients: [
        { id: sugar.id, amount: 50 },
        { id: flour.id, amount: 300 },
      ],
    });
    await createRecipeFor(author.id, { name: "Milkshake", tags: [tag.id], ingredients: [{ id: milk.id, amount: 250 }] });

    await addRecipeTo("shoppingCart", shopper.id, bread.id);
    await addRecipeTo("shoppingCart", shopper.id, cake.id);

    await expect(aggregateShoppingList(shopper.id)).resolves.toEqual([
      { name: "flour", measurementUnit: "g", totalAmount: 500 },
      { name: "sugar", measurementUnit: "g", totalAmount: 50 },
    ]);
  });

  it("keeps the same name in different units apart", async () => {
    const author = await createUser();
    const tag = await createTag("Baking");
    const sugarGrams = await createIngredient("sugar", "g");
    const sugarSpoons = await createIngredient("sugar", "tbsp");
    const recipe = await createRecipeFor(author.id, {
      tags: [tag.id],
      ingredients: [
        { id: sugarSpoons.id, amount: 2 },
        { id: sugarGrams.id, amount: 100 },
      ],
    });
    await addRecipeTo("shoppingCart", author.id, recipe.id);

    await expect(aggregateShoppingList(author.id)).resolves.toEqual([
      { name: "sugar", measurementUnit: "g", totalAmount: 100 },
      { name: "sugar", measurementUnit: "tbsp", totalAmount: 2 },
    ]);
  });

  it("is empty for an empty cart", async () => {
    const shopper = await createUser();

    await expect(aggregateShoppingList(shopper.id)).resolves.toEqual([]);
  });
});

describe("shopping list document", () => {
  it("formats totals with their unit", () => {
    expect(formatAmount({ name: "flour", measurementUnit: "g", totalAmount: 500 })).toBe("500 g");
  });

  it("renders the header, rows and item count", () => {
    const document = renderShoppingListPdf({
      rows: [
        { name: "flour", measurementUnit: "g", totalAmount: 500 },
        { name: "sugar", measurementUnit: "g", totalAmount: 50 },
      ],
      username: "alice",
      generatedAt: new Date(2024, 0, 5),
    });
    const text = pdfText(document);

    expect(text.startsWith("%PDF-")).toBe(true);
    expect(text).toContain("(Shopping list)");
    expect(text).toContain("(Date: 05.01.2024)");
    expect(text).toContain("(User: alice)");
    expect(text).toContain("(Flour)");
    expect(text).toContain("(500 g)");
    expect(text).toContain("(Items: 2)");
  });

  it("breaks long lists across pages with a footer on each", () => {
    const rows = Array.from({ length: 30 }, (_, index) => ({
      name: `item ${index + 1}`,
      measurementUnit: "pcs",
      totalAmount: index + 1,
    }));

    const text = pdfText(renderShoppingListPdf({ rows, username: "alice" }));

    expect(text.match(/\/Type \/Page\b/g)).toHaveLength(2);
    expect(text.match(/\(Forkful shopping list\)/g)).toHaveLength(2);
    expect(text).toContain("(Items: 30)");
  });

  it("falls back to the built-in font when none is configured", async () => {
    await expect(loadPdfFont()).resolves.toBeUndefined();
    await expect(loadPdfFont("/nonexistent/forkful-font.ttf")).rejects.toThrow();
  });

  it("still produces a document for an empty list", () => {
    const text = pdfText(renderShoppingListPdf({ rows: [], username: "alice" }));

    expect(text.startsWith("%PDF-")).toBe(true);
    expect(text).toContain("(Items: 0)");
  });
});

import { readFile } from "node:fs/promises";
import path from "node:path";
import { hash } from "bcryptjs";
import { eq, inArray } from "drizzle-orm";
import { z } from "zod";
import { db, pool } from "./config/db.js";
import { env } from "./config/env.js";
import { PASSWORD_HASH_ROUNDS } from "./constants.js";
import { ingredients, recipes, tags, users } from "./db/schema.js";
import { importIngredients, parseIngredientFile } from "./services/catalog.js";
import { createRecipe } from "./services/recipes.js";

const DEMO_EMAIL = "demo@forkful.local";
const DEMO_PASSWORD = "demo-password";

// 1x1 transparent PNG
const PLACEHOLDER_IMAGE =
  "data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=";

const tagFileSchema = z.array(z.object({ name: z.string().min(1), slug: z.string().min(1) }));

const readData = (name: string) => readFile(path.resolve(env.SEED_DATA_DIR, name), "utf8");

const ensureTags = async () => {
  const entries = tagFileSchema.parse(JSON.parse(await readData("tags.json")));
  await db.insert(tags).values(entries).onConflictDoNothing();
  return db.select().from(tags);
};

const ensureIngredients = async () => {
  const entries = parseIngredientFile(await readData("ingredients.json"), "json");
  const { inserted, skipped } = await importIngredients(entries);
  console.log(`[seed] ingredients inserted=${inserted} skipped=${skipped}`);
};

const ensureDemoUser = async () => {
  const existing = await db.query.users.findFirst({ where: eq(users.email, DEMO_EMAIL) });
  if (existing) {
    return existing;
  }

  const [user] = await db
    .insert(users)
    .values({
      email: DEMO_EMAIL,
      username: "demo",
      firstName: "Demo",
      lastName: "Cook",
      passwordHash: await hash(DEMO_PASSWORD, PASSWORD_HASH_ROUNDS),
    })
    .returning();
  return user;
};

const ingredientIds = async (names: string[]) => {
  const rows = await db
    .select({ id: ingredients.id, name: ingredients.name })
    .from(ingredients)
    .where(inArray(ingredients.name, names));
  return new Map(rows.map((row) => [row.name, row.id]));
};

const ensureSampleRecipes = async (authorId: number, tagIdsBySlug: Map<string, number>) => {
  const existing = await db.query.recipes.findFirst({
    where: eq(recipes.authorId, authorId),
    columns: { id: true },
  });
  if (existing) {
    return;
  }

  const samples = [
    {
      name: "Blueberry oat pancakes",
      text: "Blend oats into flour, whisk with milk and eggs, fold in blueberries and fry in small rounds.",
      cookingTime: 25,
      tags: ["breakfast"],
      lines: [
        ["oats", 120],
        ["milk", 200],
        ["eggs", 2],
        ["blueberries", 100],
      ],
    },
    {
      name: "Garlic tomato spaghetti",
      text: "Cook spaghetti. Soften garlic in olive oil, add canned tomatoes and basil, simmer, then toss.",
      cookingTime: 30,
      tags: ["lunch", "dinner"],
      lines: [
        ["spaghetti", 200],
        ["garlic", 3],
        ["canned tomatoes", 400],
        ["olive oil", 2],
        ["basil", 10],
      ],
    },
  ] as const;

  const idsByName = await ingredientIds(samples.flatMap((sample) => sample.lines.map(([name]) => name)));

  for (const sample of samples) {
    const { shortLink } = await createRecipe(authorId, {
      name: sample.name,
      text: sample.text,
      cookingTime: sample.cookingTime,
      image: PLACEHOLDER_IMAGE,
      tags: sample.tags.flatMap((slug) => tagIdsBySlug.get(slug) ?? []),
      ingredients: sample.lines.flatMap(([name, amount]) => {
        const id = idsByName.get(name);
        return id === undefined ? [] : [{ id, amount }];
      }),
    });
    console.log(`[seed] recipe "${sample.name}" short_link=${shortLink}`);
  }
};

const main = async () => {
  const allTags = await ensureTags();
  await ensureIngredients();
  const demo = await ensureDemoUser();
  await ensureSampleRecipes(demo.id, new Map(allTags.map((tag) => [tag.slug, tag.id])));

  console.log("[seed] complete.");
  console.log(`[seed] demo login: ${DEMO_EMAIL}`);
};

main()
  .catch((error) => {
    console.error("[seed] failed", error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });

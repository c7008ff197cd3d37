import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { env } from "../src/config/env.js";
import { parseIngredientFile } from "../src/services/catalog.js";

describe("project paths", () => {
  it("resolves the schema file from the project root", () => {
    expect(env.SCHEMA_SQL_PATH).toBe("server/sql/schema.sql");
    expect(existsSync(path.resolve(env.SCHEMA_SQL_PATH))).toBe(true);
  });

  it("resolves readable seed data from the project root", async () => {
    const content = await readFile(path.resolve(env.SEED_DATA_DIR, "ingredients.json"), "utf8");
    const entries = parseIngredientFile(content, "json");

    expect(existsSync(path.resolve(env.SEED_DATA_DIR, "tags.json"))).toBe(true);
    expect(entries).toContainEqual({ name: "salted butter", measurementUnit: "g" });
  });
});

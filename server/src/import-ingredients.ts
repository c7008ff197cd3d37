import { readFile } from "node:fs/promises";
import path from "node:path";
import { pool } from "./config/db.js";
import { importIngredients, parseIngredientFile } from "./services/catalog.js";

const main = async () => {
  const file = process.argv[2];
  if (!file) {
    throw new Error("Usage: npm run import:ingredients -- <file.json|file.csv>");
  }

  const format = path.extname(file).toLowerCase() === ".csv" ? "csv" : "json";
  const entries = parseIngredientFile(await readFile(file, "utf8"), format);
  const { parsed, inserted, skipped } = await importIngredients(entries);

  console.log(`[import] ${file}: parsed=${parsed} inserted=${inserted} skipped=${skipped}`);
};

main()
  .catch((error) => {
    console.error("[import] failed", error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });

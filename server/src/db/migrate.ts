import { readFile } from "node:fs/promises";
import path from "node:path";
import { pool } from "../config/db.js";
import { env } from "../config/env.js";

const SCHEMA_FILE = path.resolve(env.SCHEMA_SQL_PATH);

const main = async () => {
  const ddl = await readFile(SCHEMA_FILE, "utf8");
  console.log(`[migrate] applying ${SCHEMA_FILE}`);
  await pool.query(ddl);
  console.log("[migrate] schema is up to date.");
};

main()
  .catch((error) => {
    console.error("[migrate] failed", error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });

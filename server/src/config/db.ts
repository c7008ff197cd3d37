import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import { URL } from "node:url";
import * as schema from "../db/schema.js";
import { env } from "./env.js";

export const pool = new pg.Pool({ connectionString: env.DATABASE_URL });

export const db = drizzle(pool, { schema });

export type Database = typeof db;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

export const getDatabaseSummary = () => {
  try {
    const parsed = new URL(env.DATABASE_URL);
    return {
      protocol: parsed.protocol.replace(":", ""),
      host: parsed.hostname,
      port: parsed.port || "5432",
      database: parsed.pathname.replace("/", "") || "(default)",
    };
  } catch {
    return {
      protocol: "unknown",
      host: "unknown",
      port: "unknown",
      database: "unknown",
    };
  }
};

export const probeDatabaseReadiness = async () => {
  await db.execute(sql`SELECT 1`);

  const usersTableProbe = await db.execute<{ exists: string | null }>(
    sql`SELECT to_regclass('public.users')::text AS "exists"`,
  );

  return {
    usersTableExists: Boolean(usersTableProbe.rows[0]?.exists),
  };
};

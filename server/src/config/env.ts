import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  DATABASE_URL: z.string().min(1),
  SESSION_SECRET: z.string().min(8),
  CLIENT_URL: z.string().url(),
  SERVER_URL: z.string().url(),
  MEDIA_ROOT: z.string().min(1).default("media"),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(6),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  // Relative paths resolve against the working directory (the project root for npm scripts).
  SCHEMA_SQL_PATH: z.string().min(1).default("server/sql/schema.sql"),
  SEED_DATA_DIR: z.string().min(1).default("server/data"),
  PDF_FONT_PATH: z.string().min(1).optional(),
});

export const env = envSchema.parse(process.env);
export const isProduction = env.NODE_ENV === "production";
export const isTest = env.NODE_ENV === "test";

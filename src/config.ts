import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_MONGO_URL = "mongodb://localhost:27017";
export const DEFAULT_DB_NAME = "fomo_db";

const envSchema = z.object({
  MONGO_URL: z
    .string()
    .trim()
    .regex(/^mongodb(\+srv)?:\/\//, "must start with mongodb:// or mongodb+srv://")
    .default(DEFAULT_MONGO_URL),
  DB_NAME: z.string().trim().min(1, "must not be empty").default(DEFAULT_DB_NAME),
});

export type MigrationConfig = {
  mongoUrl: string;
  dbName: string;
};

/**
 * Reads the connection settings from the environment. Call sites load
 * `.env` through `dotenv/config` before this runs.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MigrationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return { mongoUrl: parsed.data.MONGO_URL, dbName: parsed.data.DB_NAME };
}

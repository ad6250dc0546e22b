import "dotenv/config";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

const envSchema = z.object({
  API_KEY: z.string().min(1),
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  // Without a database URL simulations are kept in memory
  DATABASE_URL: optionalString.pipe(z.string().url().optional()),
  // Without an Anthropic key the heuristic oracles drive the minds
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TICK_CRON: optionalString,
});

export const env = envSchema.parse(process.env);

// Parse CORS origins (comma-separated for multiple domains)
export const corsOrigins = env.CORS_ORIGIN.split(",").map((o) => o.trim());

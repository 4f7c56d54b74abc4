import { config as loadEnv } from "dotenv";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

// prefer .env.local, fall back to .env
export const envFile = [".env.local", ".env"].map((f) => resolve(process.cwd(), f)).find((p) => existsSync(p));

if (envFile) {
  loadEnv({ path: envFile });
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().default("127.0.0.1"),
  DATABASE_URL: z.string().min(1, "DATABASE_URL environment variable is required"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  SECRET_KEY: z.string().min(1, "SECRET_KEY environment variable is required"),
  JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
  WEB_ORIGINS: z.string().default("http://127.0.0.1:3000,http://localhost:3000"),
  CORS_ALLOW_ALL: z.string().optional(),
  OVERPASS_API_URL: z.string().url().default("https://overpass.kumi.systems/api/interpreter"),
  OVERPASS_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  OVERPASS_USER_AGENT: z.string().default("vegan-catalog-api/1.0"),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
  console.error(`[env] invalid configuration:\n  ${problems.join("\n  ")}`);
  throw new Error("Invalid environment configuration");
}

export const env: Env = parsed.data;

export const webOrigins = env.WEB_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);

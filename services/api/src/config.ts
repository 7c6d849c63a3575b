import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ALLOW_ORIGIN: z.string().min(1).default("*"),
  API_RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  API_RATE_MAX_REQUESTS: z.coerce.number().int().positive().default(1200),
  ACTIVITIES_SEED_PATH: z.string().min(1).optional()
});

export type ApiConfig = {
  port: number;
  host: string;
  corsAllowOrigin: string;
  rateWindowMs: number;
  rateMaxRequests: number;
  seedPath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid activities API env vars: ${fields}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    corsAllowOrigin: values.CORS_ALLOW_ORIGIN,
    rateWindowMs: values.API_RATE_WINDOW_MS,
    rateMaxRequests: values.API_RATE_MAX_REQUESTS,
    seedPath: values.ACTIVITIES_SEED_PATH ?? path.join(process.cwd(), "data", "activities.json")
  };
}

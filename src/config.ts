import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const optionalNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.coerce.number().optional()
);

const EnvSchema = z.object({
  OPEN_METEO_URL: z.string().url().default("https://api.open-meteo.com/v1/forecast"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  FORECAST_DAYS: z.coerce.number().int().min(1).max(16).default(7),
  FORECAST_TIMEZONE: z.string().min(1).default("auto"),
  ELEVATION_M: optionalNumber,

  HOURLY_ROWS: z.coerce.number().int().nonnegative().default(10),
  DAILY_ROWS: z.coerce.number().int().nonnegative().default(7),

  REF_TEMP_MIN_C: z.coerce.number().default(16),
  REF_TEMP_MAX_C: z.coerce.number().default(22),
  REF_TEMP_STEP_C: z.coerce.number().positive().default(0.5)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  const cfg = parsed.data;
  if (cfg.REF_TEMP_MAX_C < cfg.REF_TEMP_MIN_C) {
    throw new Error(`REF_TEMP_MAX_C (${cfg.REF_TEMP_MAX_C}) must not be below REF_TEMP_MIN_C (${cfg.REF_TEMP_MIN_C})`);
  }
  return cfg;
}

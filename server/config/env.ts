import { z } from "zod";
import { ConfigError } from "../utils/errors";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  // Spreadsheet store
  GOOGLE_SPREADSHEET_ID: z.string().min(1, "GOOGLE_SPREADSHEET_ID is required"),
  GOOGLE_CREDENTIALS_PATH: z.string().min(1, "GOOGLE_CREDENTIALS_PATH is required"),

  // Sheets quota: the write is chunked and paced
  SHEETS_WRITE_BATCH_SIZE: positiveInt(500),
  SHEETS_WRITE_PAUSE_MS: z.coerce.number().int().min(0).default(300),

  FACT_TABLE: z.string().min(1).default("fact_series"),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    const summary = Object.entries(fieldErrors)
      .map(([key, msgs]) => `${key}: ${(msgs ?? []).join(", ")}`)
      .join("; ");
    throw new ConfigError(`Invalid environment variables: ${summary}`, { fields: Object.keys(fieldErrors) });
  }

  return result.data;
}

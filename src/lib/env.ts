import { z } from "zod";

const tlsVerificationSchema = z
  .string()
  .trim()
  .optional()
  .transform((value): boolean | string => {
    if (value === undefined || value === "" || /^(true|1|yes)$/i.test(value)) {
      return true;
    }

    if (/^(false|0|no)$/i.test(value)) {
      return false;
    }

    // Anything else is a path to a CA bundle.
    return value;
  });

const envSchema = z.object({
  EXTRACT_MODEL_ID: z.string().min(1).default("glm-4"),
  EXTRACT_API_KEY: z.string().optional(),
  EXTRACT_BASE_URL: z.string().url().optional(),
  EXTRACT_TLS_VERIFY: tlsVerificationSchema,
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600000).default(60000),
  EXTRACT_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse({
  EXTRACT_MODEL_ID: process.env.EXTRACT_MODEL_ID,
  EXTRACT_API_KEY: process.env.EXTRACT_API_KEY,
  EXTRACT_BASE_URL: process.env.EXTRACT_BASE_URL || undefined,
  EXTRACT_TLS_VERIFY: process.env.EXTRACT_TLS_VERIFY,
  LLM_TIMEOUT_MS: process.env.LLM_TIMEOUT_MS,
  EXTRACT_MAX_CONCURRENCY: process.env.EXTRACT_MAX_CONCURRENCY,
  LOG_LEVEL: process.env.LOG_LEVEL,
});

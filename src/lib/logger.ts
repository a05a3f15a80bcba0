import pino from "pino";

import { env } from "@/lib/env";

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "fewshot-extract" },
  redact: {
    paths: ["apiKey", "*.apiKey", "headers.authorization"],
    censor: "[redacted]",
  },
});

export type Logger = typeof logger;

import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "./services/logger.js";

export type AppConfig = {
  tickMs: number;
  logLevel: LogLevel;
  mediaType: string;
  splitRatio: number;
  documentPath: string | null;
};

const envSchema = z.object({
  SPECDECK_TICK_MS: z.coerce.number().int().min(16).max(10_000).default(250),
  SPECDECK_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SPECDECK_MEDIA_TYPE: z.string().min(1).default("application/json"),
  SPECDECK_SPLIT: z.coerce.number().min(0.2).max(0.8).default(0.35),
  SPECDECK_DOCUMENT: z.string().min(1).optional(),
});

type EnvKey = keyof z.input<typeof envSchema>;

const ENV_KEYS: EnvKey[] = ["SPECDECK_TICK_MS", "SPECDECK_LOG_LEVEL", "SPECDECK_MEDIA_TYPE", "SPECDECK_SPLIT", "SPECDECK_DOCUMENT"];

export function loadConfig(env: NodeJS.ProcessEnv): { ok: true; config: AppConfig } | { ok: false; error: string } {
  // unset and empty variables both fall back to the default
  const input: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) {
      input[key] = value;
    }
  }

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `${issue.path.join(".")}: ${issue.message}` };
  }

  return {
    ok: true,
    config: {
      tickMs: parsed.data.SPECDECK_TICK_MS,
      logLevel: parsed.data.SPECDECK_LOG_LEVEL,
      mediaType: parsed.data.SPECDECK_MEDIA_TYPE,
      splitRatio: parsed.data.SPECDECK_SPLIT,
      documentPath: parsed.data.SPECDECK_DOCUMENT ?? null,
    },
  };
}

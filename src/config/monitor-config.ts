// src/config/monitor-config.ts
// Environment-driven configuration: `.env` is loaded with dotenv, then every key
// is validated and coerced with zod.

import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_SUBTITLE_RESP_CHECKCODE } from '../net/frame-protocol';
import type { AlignerKind } from '../speech/scorer';

export type MonitorConfig = {
  host: string;
  port: number;
  respCheckcode: number;
  subtitle: {
    enabled: boolean;
    host: string;
    port: number;
    checkcode: number;
    respCheckcode: number;
  };
  scoring: {
    threshold: number;
    maxLookahead: number;
    strategy: AlignerKind;
    updateIntervalMs: number;
  };
  relay: {
    port: number;
    accessToken?: string;
  };
  sink: {
    host: string;
    port: number;
    rawOutPath: string;
  };
  logLevel: number;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Checkcodes accept decimal or 0x-prefixed hex; Number() handles both.
const int32 = z.coerce.number().int().min(-0x80000000).max(0x7fffffff);
const port = z.coerce.number().int().min(0).max(65535);
const flag = z
  .string()
  .default('false')
  .transform((v) => v.trim().toLowerCase() === 'true');

export const EnvSchema = z.object({
  HOST: z.string().default('127.0.0.1'),
  PORT: port.default(26072),
  RESP_CHECKCODE: int32.default(20250918),
  SUBTITLE_HOST: z.string().default('127.0.0.1'),
  SUBTITLE_PORT: port.default(26071),
  SUBTITLE_CHECKCODE: int32.optional(),
  SUBTITLE_RESP_CHECKCODE: int32.default(DEFAULT_SUBTITLE_RESP_CHECKCODE),
  OUTPUT_SUBTITLE_INSERTER_ENABLE: flag,
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).default(0.6),
  MAX_LOOKAHEAD: z.coerce.number().int().min(1).max(64).default(3),
  ALIGN_STRATEGY: z.enum(['sequential', 'optimal']).default('sequential'),
  UPDATE_INTERVAL_MS: z.coerce.number().int().min(50).default(500),
  SCORE_RELAY_PORT: port.default(0),
  SCORE_RELAY_TOKEN: z.string().optional(),
  SINK_HOST: z.string().default('0.0.0.0'),
  SINK_PORT: port.default(26071),
  RAW_OUT_PATH: z.string().default('./raw_subtitle.txt'),
  MONITOR_LOG_LEVEL: z.coerce.number().int().min(0).max(3).default(1),
});

export type EnvFileResult = {
  loaded: boolean;
  path: string;
};

/** Loads `<baseDir>/.env` into process.env without overriding variables already set. */
export function loadEnvFile(baseDir = process.cwd()): EnvFileResult {
  const envPath = path.join(baseDir, '.env');
  const result = dotenv.config({ path: envPath });
  return { loaded: !result.error, path: envPath };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  // Blank variables fall back to their defaults.
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value != null && value.trim() !== '') present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    respCheckcode: e.RESP_CHECKCODE,
    subtitle: {
      enabled: e.OUTPUT_SUBTITLE_INSERTER_ENABLE,
      host: e.SUBTITLE_HOST,
      port: e.SUBTITLE_PORT,
      checkcode: e.SUBTITLE_CHECKCODE ?? e.RESP_CHECKCODE,
      respCheckcode: e.SUBTITLE_RESP_CHECKCODE,
    },
    scoring: {
      threshold: e.SIMILARITY_THRESHOLD,
      maxLookahead: e.MAX_LOOKAHEAD,
      strategy: e.ALIGN_STRATEGY,
      updateIntervalMs: e.UPDATE_INTERVAL_MS,
    },
    relay: {
      port: e.SCORE_RELAY_PORT,
      accessToken: e.SCORE_RELAY_TOKEN,
    },
    sink: {
      host: e.SINK_HOST,
      port: e.SINK_PORT,
      rawOutPath: e.RAW_OUT_PATH,
    },
    logLevel: e.MONITOR_LOG_LEVEL,
  };
}

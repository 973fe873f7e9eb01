// src/env/logging.ts
// Central logging helpers with a CI/test quiet mode gate.

import { shouldLogLevel, shouldLogTag } from './dev-log';

export function isQuietEnv(): boolean {
  const env = process.env;
  if (env.MONITOR_LOG_LEVEL != null && env.MONITOR_LOG_LEVEL !== '') return false;
  return Boolean(env.CI || env.JEST_WORKER_ID);
}

export interface Logger {
  info(msg: string, ...data: unknown[]): void;
  warn(msg: string, ...data: unknown[]): void;
  error(msg: string, ...data: unknown[]): void;
  debug(msg: string, ...data: unknown[]): void;
  trace(msg: string, ...data: unknown[]): void;
  /** Verbose probe throttled per key, for per-frame / per-tick noise. */
  probe(key: string, msg: string, ...data: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const gate = (level: number) => !isQuietEnv() && shouldLogLevel(level);
  return {
    info(msg, ...data) {
      if (gate(1)) console.log(prefix, msg, ...data);
    },
    warn(msg, ...data) {
      if (gate(1)) console.warn(prefix, msg, ...data);
    },
    error(msg, ...data) {
      if (gate(1)) console.error(prefix, msg, ...data);
    },
    debug(msg, ...data) {
      if (gate(2)) console.debug(prefix, msg, ...data);
    },
    trace(msg, ...data) {
      if (gate(3)) console.debug(prefix, msg, ...data);
    },
    probe(key, msg, ...data) {
      if (isQuietEnv()) return;
      if (shouldLogTag(`${tag}:${key}`, 2)) console.debug(prefix, msg, ...data);
    },
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

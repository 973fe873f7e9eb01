// Centralized log-level helpers.
// Levels:
// 0 = silent
// 1 = normal (state transitions + warnings/errors)
// 2 = verbose probes
// 3 = trace/stack heavy diagnostics

export const MIN_LOG_LEVEL = 0;
export const MAX_LOG_LEVEL = 3;
const DEFAULT_LOG_LEVEL = 1;

const tagLastAt = new Map<string, number>();
let runtimeLevel: number | null = null;

export function clampLogLevel(value: number): number {
  if (!Number.isFinite(value)) return MIN_LOG_LEVEL;
  return Math.max(MIN_LOG_LEVEL, Math.min(MAX_LOG_LEVEL, Math.floor(value)));
}

export function parseLogLevelRaw(value: unknown): number | null {
  if (value == null || value === '') return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return null;
  return clampLogLevel(parsed);
}

/** Override the env-derived level for this process (CLI flags, tests). Pass null to clear. */
export function setLogLevel(level: number | null): void {
  runtimeLevel = level == null ? null : clampLogLevel(level);
}

export function getLogLevel(): number {
  if (runtimeLevel != null) return runtimeLevel;
  const fromEnv = parseLogLevelRaw(process.env.MONITOR_LOG_LEVEL);
  if (fromEnv != null) return fromEnv;
  return DEFAULT_LOG_LEVEL;
}

export function shouldLogLevel(minLevel: number): boolean {
  return getLogLevel() >= clampLogLevel(minLevel);
}

export function shouldLogTag(
  tag: string,
  minLevel = 2,
  throttleMs = 500,
): boolean {
  if (!shouldLogLevel(minLevel)) return false;
  const throttle = Math.max(0, Math.floor(throttleMs));
  if (!tag || throttle <= 0) return true;
  const now = Date.now();
  const last = tagLastAt.get(tag) ?? 0;
  if (now - last < throttle) return false;
  tagLastAt.set(tag, now);
  return true;
}

export function resetLogThrottle(): void {
  tagLastAt.clear();
}

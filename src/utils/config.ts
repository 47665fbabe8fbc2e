/**
 * Environment configuration
 *
 * Every setting has a default, so nothing here is required. Values that do
 * not parse fall back to the default.
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const DEFAULT_LOG_LEVEL: LogLevel = "warn";
const DEFAULT_PAGE_SIZE = 3;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isTruthy(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

/**
 * Get log level from LOG_LEVEL or default to 'warn'
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Pretty printing is opt-in through LOG_PRETTY=true
 */
export function shouldUsePretty(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthy(env.LOG_PRETTY);
}

/**
 * Page size used by the demo list when --per-page is not given
 */
export function getDefaultPageSize(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.PROMPTS_PAGE_SIZE?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return DEFAULT_PAGE_SIZE;
  }
  const size = Number.parseInt(raw, 10);
  return size > 0 ? size : DEFAULT_PAGE_SIZE;
}

/**
 * Whether the demos may clear the screen (PROMPTS_NO_CLEAR turns it off)
 */
export function shouldClearScreen(env: NodeJS.ProcessEnv = process.env): boolean {
  return !isTruthy(env.PROMPTS_NO_CLEAR);
}

/**
 * Log levels, defaults and environment configuration
 */

import type { LogLevel, ThemeName } from './types.js';
import { InvalidLevelError } from './errors.js';

/**
 * Default minimum level for a fresh registry
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Log level hierarchy for comparison
 * Higher numbers indicate higher severity
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  annoying: 0,
  pedantic: 1,
  debug: 2,
  trace: 3,
  verbose: 4,
  info: 5,
  warn: 6,
  error: 7,
  critical: 8
};

/**
 * Every level, ordered by ascending severity
 */
export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
  'annoying',
  'pedantic',
  'debug',
  'trace',
  'verbose',
  'info',
  'warn',
  'error',
  'critical'
] satisfies LogLevel[]);

/**
 * Three-letter codes used in level badges and as method aliases
 */
export const LOG_LEVEL_SHORT_NAMES: Record<LogLevel, string> = {
  annoying: 'ayg',
  pedantic: 'ped',
  debug: 'dbg',
  trace: 'trc',
  verbose: 'vrb',
  info: 'inf',
  warn: 'wrn',
  error: 'err',
  critical: 'crt'
};

/**
 * Checks if a log level should be processed based on current minimum level
 *
 * @param level - Log level to check
 * @param minLevel - Minimum log level configured
 * @returns True if log should be processed
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Orders two levels by severity: negative when `a` is less severe than `b`
 */
export function compareLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_PRIORITY[a] - LOG_LEVEL_PRIORITY[b];
}

export function levelName(level: LogLevel): string {
  return level;
}

export function levelShortName(level: LogLevel): string {
  return LOG_LEVEL_SHORT_NAMES[level];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Parses a level from its long name or short code, ignoring case and
 * surrounding whitespace
 *
 * @throws {InvalidLevelError} If the input names no level
 */
export function parseLevel(input: string): LogLevel {
  const normalized = input.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  const byShortName = LOG_LEVELS.find(level => LOG_LEVEL_SHORT_NAMES[level] === normalized);
  if (byShortName) {
    return byShortName;
  }
  throw new InvalidLevelError(input);
}

/**
 * Theme names accepted by FIELDLINE_THEME
 */
export const THEME_NAMES: readonly ThemeName[] = ['colorized', 'plain', 'json'];

function findThemeName(value: string): ThemeName | undefined {
  return THEME_NAMES.find(name => name === value);
}

/**
 * Settings read from the process environment
 */
export interface EnvironmentConfig {
  level?: LogLevel;
  theme?: ThemeName;
  /** Problems found while reading the environment */
  warnings: string[];
}

/**
 * Reads FIELDLINE_LEVEL and FIELDLINE_THEME. Unknown values are reported in
 * `warnings` and otherwise ignored.
 *
 * @param env - Environment variables (defaults to process.env)
 */
export function readEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const config: EnvironmentConfig = { warnings: [] };

  const rawLevel = env.FIELDLINE_LEVEL;
  if (rawLevel !== undefined && rawLevel !== '') {
    try {
      config.level = parseLevel(rawLevel);
    } catch (error) {
      if (!(error instanceof InvalidLevelError)) throw error;
      config.warnings.push(`Ignoring FIELDLINE_LEVEL="${rawLevel}": not a log level`);
    }
  }

  const rawTheme = env.FIELDLINE_THEME;
  if (rawTheme !== undefined && rawTheme !== '') {
    const theme = findThemeName(rawTheme.trim().toLowerCase());
    if (theme) {
      config.theme = theme;
    } else {
      config.warnings.push(
        `Ignoring FIELDLINE_THEME="${rawTheme}": expected one of ${THEME_NAMES.join(', ')}`
      );
    }
  }

  return config;
}

/**
 * Process-wide Logger Registry
 *
 * Holds the state every logger reads on each emit: the minimum level, the
 * active theme, whether the destination accepts colors, the default sink and
 * the clock. Loggers never copy any of it, so a change is visible to loggers
 * created before and after it.
 *
 * Each setting is an independent cell replaced by a single assignment; a
 * reader observes either the previous or the new value. The registry is
 * created lazily on first use and may be replaced wholesale with
 * `configureRegistry`.
 *
 * @example
 * ```typescript
 * import { configureRegistry, setLevel, setTheme, themes, MemorySink } from 'fieldline';
 *
 * setLevel('debug');
 * setTheme(themes.PLAIN);
 *
 * // Tests: deterministic clock and captured output
 * const sink = new MemorySink();
 * configureRegistry({ sink, clock: () => 0, colorProbe: () => false });
 * ```
 */

import type { Clock, ColorProbe, LogLevel, Sink, Theme } from './types.js';
import { DEFAULT_LOG_LEVEL, isLogLevel, readEnvironmentConfig } from './logger-config.js';
import { InvalidLevelError } from './errors.js';
import { defaultColorProbe, themeByName, themes } from '../themes/index.js';
import { ConsoleSink } from '../sinks/stream-sink.js';

/**
 * Registry construction options; anything omitted falls back to the
 * environment and then to defaults
 */
export interface RegistryOptions {
  /** Minimum level (default: FIELDLINE_LEVEL, then 'info') */
  level?: LogLevel;

  /** Active theme (default: FIELDLINE_THEME, then COLORIZED or PLAIN by color support) */
  theme?: Theme;

  /** Color capability oracle (default: TTY and NO_COLOR/FORCE_COLOR detection on stderr) */
  colorProbe?: ColorProbe;

  /** Sink for loggers without their own (default: standard error) */
  sink?: Sink;

  /** Timestamp source (default: Date.now) */
  clock?: Clock;

  /** Environment consulted for FIELDLINE_* settings (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class LoggerRegistry {
  private minLevel: LogLevel;
  private activeTheme: Theme;
  private colorEnabled: boolean;
  private activeSink: Sink;
  private clock: Clock;
  private readonly colorProbe: ColorProbe;

  constructor(options: RegistryOptions = {}) {
    const envConfig = readEnvironmentConfig(options.env ?? process.env);
    envConfig.warnings.forEach(warning => {
      console.warn(`[fieldline] ${warning}`);
    });

    this.colorProbe = options.colorProbe ?? defaultColorProbe;
    this.colorEnabled = this.colorProbe();
    this.minLevel = options.level ?? envConfig.level ?? DEFAULT_LOG_LEVEL;
    this.activeTheme = options.theme
      ?? (envConfig.theme ? themeByName(envConfig.theme) : this.defaultTheme());
    this.activeSink = options.sink ?? new ConsoleSink();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Current minimum log level
   */
  get level(): LogLevel {
    return this.minLevel;
  }

  /**
   * Replace the minimum log level
   *
   * @throws {InvalidLevelError} If `level` is not a log level
   */
  setLevel(level: LogLevel): void {
    if (!isLogLevel(level)) {
      throw new InvalidLevelError(level);
    }
    this.minLevel = level;
  }

  get theme(): Theme {
    return this.activeTheme;
  }

  setTheme(theme: Theme): void {
    if (!theme || typeof theme.render !== 'function') {
      throw new TypeError('Theme must have a render method');
    }
    this.activeTheme = theme;
  }

  /**
   * Whether rendering should emit ANSI colors
   */
  get colors(): boolean {
    return this.colorEnabled;
  }

  setColorEnabled(enabled: boolean): void {
    this.colorEnabled = enabled;
  }

  /**
   * Query the color oracle again and adopt its answer
   *
   * @returns The new color setting
   */
  refreshColorSupport(): boolean {
    this.colorEnabled = this.colorProbe();
    return this.colorEnabled;
  }

  get sink(): Sink {
    return this.activeSink;
  }

  setSink(sink: Sink): void {
    if (!sink || typeof sink.write !== 'function') {
      throw new TypeError('Sink must have a write method');
    }
    this.activeSink = sink;
  }

  setClock(clock: Clock): void {
    this.clock = clock;
  }

  /** Current time from the configured clock */
  now(): number {
    return this.clock();
  }

  /** Flush the default sink */
  flush(): void {
    this.activeSink.flush?.();
  }

  private defaultTheme(): Theme {
    return this.colorEnabled ? themes.COLORIZED : themes.PLAIN;
  }
}

let registry: LoggerRegistry | undefined;

/**
 * The process-wide registry, created on first use
 */
export function getRegistry(): LoggerRegistry {
  registry ??= new LoggerRegistry();
  return registry;
}

/**
 * Replace the process-wide registry with one built from `options`
 */
export function configureRegistry(options: RegistryOptions = {}): LoggerRegistry {
  registry = new LoggerRegistry(options);
  return registry;
}

/**
 * Drop the process-wide registry; the next use re-initializes it from the
 * environment
 */
export function resetRegistry(): void {
  registry = undefined;
}

/** Set the process-wide minimum level */
export function setLevel(level: LogLevel): void {
  getRegistry().setLevel(level);
}

/** Get the process-wide minimum level */
export function getLevel(): LogLevel {
  return getRegistry().level;
}

/** Set the process-wide theme */
export function setTheme(theme: Theme): void {
  getRegistry().setTheme(theme);
}

/** Get the process-wide theme */
export function getTheme(): Theme {
  return getRegistry().theme;
}

export function setColorEnabled(enabled: boolean): void {
  getRegistry().setColorEnabled(enabled);
}

export function isColorEnabled(): boolean {
  return getRegistry().colors;
}

export function refreshColorSupport(): boolean {
  return getRegistry().refreshColorSupport();
}

export function setSink(sink: Sink): void {
  getRegistry().setSink(sink);
}

export function getSink(): Sink {
  return getRegistry().sink;
}

export function setClock(clock: Clock): void {
  getRegistry().setClock(clock);
}

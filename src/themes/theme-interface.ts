/**
 * Theme interfaces and utilities for fieldline
 */

import type { LogLevel, LogRecord, RenderOptions, Theme } from '../logger/types.js';

/**
 * ANSI SGR codes for terminal output
 */
export const AnsiColor = {
  none: 0,
  // Foreground colors
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  brightBlack: 90,
  brightRed: 91,
  brightGreen: 92,
  brightYellow: 93,
  brightBlue: 94,
  brightMagenta: 95,
  brightCyan: 96,
  brightWhite: 97,
  // Background colors
  onRed: 41,
  onGreen: 42,
  onYellow: 43,
  onBlue: 44,
  onMagenta: 45,
  onCyan: 46,
  onWhite: 47,
  onGray: 100
} as const;

export type AnsiColorName = keyof typeof AnsiColor;

/** Resets all SGR attributes */
export const ANSI_RESET = '\x1b[0m';

/**
 * Wraps text in the escape sequence for `color`. Empty text and the `none`
 * color are returned untouched.
 */
export function paint(text: string, color: AnsiColorName): string {
  const code = AnsiColor[color];
  if (code === 0 || text === '') {
    return text;
  }
  return `\x1b[${code}m${text}${ANSI_RESET}`;
}

/**
 * Removes every SGR escape sequence from `text`
 */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Colors for each part of a text line
 */
export interface ThemePalette {
  levels: Record<LogLevel, AnsiColorName>;
  timestamp: AnsiColorName;
  name: AnsiColorName;
  message: AnsiColorName;
  fieldKey: AnsiColorName;
  fieldValue: AnsiColorName;
}

/**
 * Default palette: severities from bright magenta down to gray
 */
export const DEFAULT_PALETTE: Readonly<ThemePalette> = Object.freeze({
  levels: Object.freeze({
    critical: 'brightMagenta',
    error: 'red',
    warn: 'yellow',
    info: 'green',
    verbose: 'blue',
    trace: 'white',
    debug: 'brightBlack',
    pedantic: 'brightBlack',
    annoying: 'brightBlack'
  }),
  timestamp: 'brightBlack',
  name: 'cyan',
  message: 'none',
  fieldKey: 'brightCyan',
  fieldValue: 'none'
});

/**
 * Timestamp column formats
 */
export type TimestampFormat = 'HH:mm:ss.SSS' | 'HH:mm:ss' | 'iso' | 'none';

/**
 * Column layout for text themes
 */
export interface ThemeLayout {
  /** Column width of the bracketed logger name */
  nameWidth: number;

  /** Column width of the message when fields follow it; 0 disables padding */
  messageWidth: number;

  /** Timestamp column format */
  timestamps: TimestampFormat;
}

export const DEFAULT_LAYOUT: Readonly<ThemeLayout> = Object.freeze({
  nameWidth: 12,
  messageWidth: 44,
  timestamps: 'HH:mm:ss.SSS'
});

/**
 * Base theme class with common functionality
 */
export abstract class BaseTheme implements Theme {
  public readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Render a record to one line
   */
  abstract render(_record: LogRecord, _options?: RenderOptions): string;
}

const CONTROL_ESCAPES: Readonly<Record<string, string>> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
};

/**
 * Utility functions for formatting log data
 */
export const Formatters = {
  /**
   * Format timestamp (UTC) with configurable format
   */
  timestamp(timestamp: number, format: TimestampFormat = 'HH:mm:ss.SSS'): string {
    if (format === 'none') {
      return '';
    }

    const iso = new Date(timestamp).toISOString();

    if (format === 'iso') {
      return iso;
    }

    if (format === 'HH:mm:ss') {
      return iso.slice(11, 19); // HH:mm:ss from ISO string
    }

    return iso.slice(11, 23); // HH:mm:ss.SSS from ISO string
  },

  /**
   * Escapes line breaks and other control characters so a record is one
   * line and never carries terminal escape sequences
   */
  singleLine(text: string): string {
    return text.replace(
      /[\x00-\x1f\x7f]/g,
      char => CONTROL_ESCAPES[char] ?? `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`
    );
  },

  /**
   * Pads already-painted text to `width` visible columns
   */
  padVisible(painted: string, visibleLength: number, width: number): string {
    return visibleLength >= width ? painted : painted + ' '.repeat(width - visibleLength);
  }
} as const;

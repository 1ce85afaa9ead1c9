/**
 * Shared constants and helpers for test files
 */

import { configureRegistry, type RegistryOptions } from '../src/logger/logger-registry.js';
import { MemorySink } from '../src/sinks/memory-sink.js';
import { themes } from '../src/themes/index.js';

export const TEST_CONSTANTS = {
  // 2024-01-02T03:04:05.678Z
  FIXED_TIME: Date.UTC(2024, 0, 2, 3, 4, 5, 678),
  FIXED_CLOCK_TEXT: '03:04:05.678',

  LOGGER_NAMES: {
    APP: 'app',
    DATABASE: 'db',
    HTTP: 'http',
    WORKER: 'worker'
  },

  MESSAGES: {
    CONN_FAILED: 'conn failed',
    SERVER_STARTED: 'server started',
    REQUEST_DONE: 'request done',
    CACHE_MISS: 'cache miss'
  },

  // Default text layout
  NAME_WIDTH: 12,
  MESSAGE_WIDTH: 44,

  ESCAPE: '\x1b['
} as const;

/**
 * Installs a registry writing to a fresh memory sink with a fixed clock, no
 * color support and an empty environment; returns the sink
 */
export function useMemoryRegistry(overrides: RegistryOptions = {}): MemorySink {
  const sink = new MemorySink();
  configureRegistry({
    sink,
    clock: () => TEST_CONSTANTS.FIXED_TIME,
    colorProbe: () => false,
    theme: themes.PLAIN,
    env: {},
    ...overrides
  });
  return sink;
}

/**
 * The plain-theme line for a record at the fixed test time
 */
export function plainLine(code: string, name: string, message: string, fieldText?: string): string {
  const head = `${TEST_CONSTANTS.FIXED_CLOCK_TEXT} [${code}] ${(name ? `[${name}]` : '').padEnd(TEST_CONSTANTS.NAME_WIDTH)} `;
  return fieldText === undefined
    ? head + message
    : `${head}${message.padEnd(TEST_CONSTANTS.MESSAGE_WIDTH)} ${fieldText}`;
}

/**
 * Sink interfaces and utilities for fieldline
 */

import type { Sink } from '../logger/types.js';

/**
 * Line terminator appended to every rendered record
 */
export const LINE_TERMINATOR = '\n';

/**
 * Base sink class with common functionality
 */
export abstract class BaseSink implements Sink {
  public readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Append one line (terminator included) to this sink
   */
  abstract write(_line: string): void;

  /**
   * Flush any pending output (default: no-op)
   */
  flush(): void {
    // Default implementation - no buffering
  }

  /**
   * Close the sink and clean up resources (default: no-op)
   */
  close(): void {
    // Default implementation - no cleanup needed
  }
}

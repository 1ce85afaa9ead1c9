/**
 * Stream sinks
 *
 * Each line goes to the stream in a single `write` call, so lines from
 * concurrent callers sharing the stream never interleave mid-line.
 *
 * @example
 * ```typescript
 * import { StreamSink, setSink } from 'fieldline';
 *
 * setSink(new StreamSink(process.stdout, { name: 'stdout' }));
 * ```
 */

import { SinkWriteError, errorMessage } from '../logger/errors.js';
import { BaseSink } from './sink-interface.js';

/**
 * The part of a Node.js writable stream a sink relies on
 */
export interface WritableLike {
  write(chunk: string): boolean;
  readonly destroyed?: boolean;
  readonly writableEnded?: boolean;
}

export interface StreamSinkConfig {
  /** Sink name (default: 'stream') */
  name?: string;
}

/**
 * Sink writing lines to a writable stream
 */
export class StreamSink extends BaseSink {
  constructor(
    private readonly stream: WritableLike,
    config: StreamSinkConfig = {}
  ) {
    super(config.name ?? 'stream');
  }

  /**
   * Write one line to the stream
   *
   * @throws {SinkWriteError} If the stream is destroyed or ended, or `write` throws
   */
  write(line: string): void {
    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new SinkWriteError(this.name, 'stream is no longer writable');
    }
    try {
      this.stream.write(line);
    } catch (error) {
      throw new SinkWriteError(this.name, errorMessage(error), { cause: error });
    }
  }
}

/**
 * Sink writing to the process's standard error
 */
export class ConsoleSink extends StreamSink {
  constructor() {
    super(process.stderr, { name: 'console' });
  }
}

/**
 * Create a sink for standard error
 */
export function createConsoleSink(): ConsoleSink {
  return new ConsoleSink();
}

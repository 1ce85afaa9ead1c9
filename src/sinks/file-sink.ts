/**
 * Append-only file sink
 *
 * Opens the file synchronously in append mode and writes each line with one
 * synchronous call, so failures reach the emitting caller.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import { SinkWriteError, errorMessage } from '../logger/errors.js';
import { BaseSink } from './sink-interface.js';

export interface FileSinkConfig {
  /** Sink name (default: 'file') */
  name?: string;

  /** File mode used when the file is created (default: 0o644) */
  mode?: number;
}

export class FileSink extends BaseSink {
  readonly path: string;
  private fd: number | undefined;

  /**
   * @throws {SinkWriteError} If the file cannot be opened for appending
   */
  constructor(path: string, config: FileSinkConfig = {}) {
    super(config.name ?? 'file');
    this.path = path;
    try {
      this.fd = openSync(path, 'a', config.mode ?? 0o644);
    } catch (error) {
      throw new SinkWriteError(this.name, `cannot open ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  get isOpen(): boolean {
    return this.fd !== undefined;
  }

  /**
   * @throws {SinkWriteError} If the sink is closed or the write fails
   */
  write(line: string): void {
    if (this.fd === undefined) {
      throw new SinkWriteError(this.name, `${this.path} is closed`);
    }
    try {
      writeSync(this.fd, line);
    } catch (error) {
      throw new SinkWriteError(this.name, errorMessage(error), { cause: error });
    }
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    closeSync(fd);
  }
}

/**
 * In-memory sink capturing lines, mostly for tests and previews
 */

import { BaseSink, LINE_TERMINATOR } from './sink-interface.js';

export class MemorySink extends BaseSink {
  private readonly buffer: string[] = [];

  constructor(name: string = 'memory') {
    super(name);
  }

  write(line: string): void {
    this.buffer.push(line.endsWith(LINE_TERMINATOR) ? line.slice(0, -LINE_TERMINATOR.length) : line);
  }

  /** Captured lines without terminators */
  get lines(): readonly string[] {
    return [...this.buffer];
  }

  /** Captured output joined with line terminators */
  get output(): string {
    return this.buffer.map(line => line + LINE_TERMINATOR).join('');
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer.length = 0;
  }
}

/**
 * Fan-out sink
 *
 * Writes every line to each member sink in order. A failing member does not
 * stop the others; once all have been tried the failures are raised together.
 */

import type { Sink } from '../logger/types.js';
import { SinkWriteError, errorMessage } from '../logger/errors.js';
import { BaseSink } from './sink-interface.js';

export class MultiplexSink extends BaseSink {
  private readonly sinks: Sink[];

  constructor(...sinks: readonly Sink[]) {
    super('multiplex');
    this.sinks = [...sinks];
  }

  get members(): readonly Sink[] {
    return [...this.sinks];
  }

  add(sink: Sink): void {
    this.sinks.push(sink);
  }

  /**
   * Remove a member by name
   *
   * @returns True if a member was removed
   */
  remove(name: string): boolean {
    const index = this.sinks.findIndex(sink => sink.name === name);
    if (index < 0) return false;
    this.sinks.splice(index, 1);
    return true;
  }

  /**
   * @throws {SinkWriteError} If any member fails; `cause` is an AggregateError
   */
  write(line: string): void {
    this.forEachMember('write', sink => sink.write(line));
  }

  flush(): void {
    this.forEachMember('flush', sink => sink.flush?.());
  }

  close(): void {
    this.forEachMember('close', sink => sink.close?.());
  }

  private forEachMember(operation: string, action: (sink: Sink) => void): void {
    const failures: unknown[] = [];
    const failedNames: string[] = [];
    for (const sink of this.sinks) {
      try {
        action(sink);
      } catch (error) {
        failures.push(error);
        failedNames.push(sink.name);
      }
    }
    if (failures.length === 0) return;

    const summary = failures.length === 1
      ? `${operation} failed on ${failedNames.join(', ')}: ${errorMessage(failures[0])}`
      : `${operation} failed on ${failedNames.join(', ')}`;
    throw new SinkWriteError(this.name, summary, {
      cause: new AggregateError(failures, `${failures.length} sink(s) failed`)
    });
  }
}

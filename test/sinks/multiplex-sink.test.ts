import { describe, it, expect, vi } from 'vitest';
import { MultiplexSink } from '../../src/sinks/multiplex-sink.js';
import { MemorySink } from '../../src/sinks/memory-sink.js';
import { SinkWriteError } from '../../src/logger/errors.js';
import type { Sink } from '../../src/logger/types.js';

function failingSink(name: string): Sink {
  return {
    name,
    write: () => {
      throw new Error('disk full');
    }
  };
}

function captureError(action: () => void): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('MultiplexSink', () => {
  it('writes every line to each member in order', () => {
    const first = new MemorySink('first');
    const second = new MemorySink('second');
    const sink = new MultiplexSink(first, second);

    sink.write('line\n');

    expect(first.lines).toEqual(['line']);
    expect(second.lines).toEqual(['line']);
    expect(sink.name).toBe('multiplex');
  });

  it('keeps writing after a member fails', () => {
    const healthy = new MemorySink('healthy');
    const sink = new MultiplexSink(failingSink('bad'), healthy);

    const error = captureError(() => sink.write('line\n'));

    expect(healthy.lines).toEqual(['line']);
    expect(error).toBeInstanceOf(SinkWriteError);
    if (error instanceof SinkWriteError) {
      expect(error.message).toBe('Sink "multiplex" failed: write failed on bad: disk full');
      expect(error.cause).toBeInstanceOf(AggregateError);
    }
  });

  it('reports every failing member', () => {
    const sink = new MultiplexSink(failingSink('bad1'), new MemorySink(), failingSink('bad2'));

    const error = captureError(() => sink.write('line\n'));

    expect(error).toBeInstanceOf(SinkWriteError);
    if (error instanceof SinkWriteError) {
      expect(error.message).toBe('Sink "multiplex" failed: write failed on bad1, bad2');
      const cause = error.cause;
      expect(cause).toBeInstanceOf(AggregateError);
      if (cause instanceof AggregateError) {
        expect(cause.errors).toHaveLength(2);
      }
    }
  });

  it('adds and removes members by name', () => {
    const kept = new MemorySink('kept');
    const dropped = new MemorySink('dropped');
    const sink = new MultiplexSink(kept);

    sink.add(dropped);
    expect(sink.members.map(member => member.name)).toEqual(['kept', 'dropped']);

    expect(sink.remove('dropped')).toBe(true);
    expect(sink.remove('unknown')).toBe(false);
    sink.write('line\n');

    expect(kept.lines).toEqual(['line']);
    expect(dropped.size).toBe(0);
  });

  it('flushes and closes members that support it', () => {
    const member = new MemorySink();
    const flushSpy = vi.spyOn(member, 'flush');
    const closeSpy = vi.spyOn(member, 'close');
    const sink = new MultiplexSink(member, { name: 'bare', write: () => {} });

    sink.flush();
    sink.close();

    expect(flushSpy).toHaveBeenCalledTimes(1);
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});

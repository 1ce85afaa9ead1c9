/**
 * Line sinks
 *
 * - ConsoleSink: standard error (the default)
 * - StreamSink: any writable stream
 * - FileSink: append-only file
 * - MemorySink: captured lines
 * - MultiplexSink: fan-out to several sinks
 */

export * from './sink-interface.js';
export * from './stream-sink.js';
export * from './file-sink.js';
export * from './memory-sink.js';
export * from './multiplex-sink.js';

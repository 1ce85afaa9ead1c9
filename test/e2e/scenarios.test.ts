import { describe, it, expect, vi } from 'vitest';
import {
  MemorySink,
  MultiplexSink,
  field,
  fields,
  getLogger,
  setLevel,
  setSink,
  setTheme,
  themes
} from '../../src/index.js';
import { TEST_CONSTANTS, plainLine, useMemoryRegistry } from '../test-constants.js';

describe('End-to-end scenarios', () => {
  it('logs a scoped error with accumulated fields in one write', () => {
    const sink = useMemoryRegistry();
    const writeSpy = vi.spyOn(sink, 'write');

    getLogger('app').withName('db').withField('retry', 3).error('conn failed');

    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(sink.lines).toEqual([plainLine('err', 'app.db', 'conn failed', 'retry=3')]);
  });

  it('writes nothing below the minimum level', () => {
    const sink = useMemoryRegistry();
    const writeSpy = vi.spyOn(sink, 'write');
    setLevel('critical');

    getLogger('app').withName('db').withField('retry', 3).info('conn failed');

    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('renders floats in decimal form', () => {
    const sink = useMemoryRegistry();

    getLogger('app').info('measured', field('n', 3.14), field('tiny', 0.0000001), field('huge', 1e21));

    expect(sink.lines).toEqual([
      plainLine('inf', 'app', 'measured', 'n=3.14 tiny=0.0000001 huge=1000000000000000000000')
    ]);
  });

  it('applies reconfiguration to existing loggers', () => {
    const first = useMemoryRegistry();
    const logger = getLogger('api').withField('status', 200);

    logger.info('request done');
    const second = new MemorySink('second');
    setSink(second);
    setTheme(themes.JSON);
    logger.info('request done', ...fields({ cached: false }));

    expect(first.lines).toEqual([plainLine('inf', 'api', 'request done', 'status=200')]);
    expect(second.lines).toEqual([
      '{"time":"2024-01-02T03:04:05.678Z","level":"info","logger":"api","msg":"request done","fields":{"status":200,"cached":false}}'
    ]);
  });

  it('fans out to several destinations', () => {
    const text = new MemorySink('text');
    const archive = new MemorySink('archive');
    useMemoryRegistry({ sink: new MultiplexSink(text, archive) });

    getLogger(TEST_CONSTANTS.LOGGER_NAMES.HTTP).warnf('slow response: %.1fs', 2.25);

    expect(text.lines).toEqual([plainLine('wrn', 'http', 'slow response: 2.3s')]);
    expect(archive.lines).toEqual(text.lines);
  });
});

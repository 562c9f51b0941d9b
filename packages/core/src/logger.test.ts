import { describe, it, expect, afterEach } from 'vitest';
import { Logger, LogLevel, parseLogLevel, type LogSink } from './logger';

function capture(): { sink: LogSink; lines: unknown[][] } {
  const lines: unknown[][] = [];
  return { sink: (level, ...args) => lines.push([level, ...args]), lines };
}

afterEach(() => {
  Logger.setSink(null);
  Logger.setLevel(LogLevel.INFO);
});

describe('Logger', () => {
  it('tags messages with the module name', () => {
    const { sink, lines } = capture();
    Logger.setSink(sink);

    new Logger('Engine').warn('slow', 42);

    expect(lines).toEqual([[LogLevel.WARN, '[Engine]', 'slow', 42]]);
  });

  it('drops messages below the global level', () => {
    const { sink, lines } = capture();
    Logger.setSink(sink);
    Logger.setLevel(LogLevel.WARN);
    const log = new Logger('Cache');

    log.debug('a');
    log.info('b');
    log.error('c');

    expect(lines).toEqual([[LogLevel.ERROR, '[Cache]', 'c']]);
    expect(Logger.getLevel()).toBe(LogLevel.WARN);
  });

  it('is silent at SILENT', () => {
    const { sink, lines } = capture();
    Logger.setSink(sink);
    Logger.setLevel(LogLevel.SILENT);

    new Logger('X').error('nope');

    expect(lines).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('verbose')).toBeNull();
  });
});

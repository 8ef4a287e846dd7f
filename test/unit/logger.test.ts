import { Writable } from 'node:stream';
import { describe, expect, test } from 'vitest';
import { LogLevel, Logger, createLogger, noopLogger } from '../../src/core/logger.js';

function sink(): { lines: string[]; stream: Writable } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    },
  });
  return { lines, stream };
}

describe('Logger', () => {
  test('writes one JSON object per line', () => {
    const { lines, stream } = sink();
    const log = new Logger({ level: LogLevel.INFO, timestamp: false, stream });
    log.info('compiled', { routes: 3 });
    expect(lines).toEqual(['{"level":"INFO","msg":"compiled","routes":3}\n']);
  });

  test('drops messages below its level', () => {
    const { lines, stream } = sink();
    const log = new Logger({ level: LogLevel.WARN, timestamp: false, stream });
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');
    expect(lines.map((l) => JSON.parse(l).level)).toEqual(['WARN', 'ERROR']);
    expect(log.enabled(LogLevel.INFO)).toBe(false);
    expect(log.enabled(LogLevel.WARN)).toBe(true);
  });

  test('setLevel changes what is written', () => {
    const { lines, stream } = sink();
    const log = new Logger({ level: LogLevel.SILENT, timestamp: false, stream });
    log.error('hidden');
    log.setLevel(LogLevel.DEBUG);
    log.debug('shown');
    expect(log.level).toBe(LogLevel.DEBUG);
    expect(lines).toHaveLength(1);
  });

  test('adds name, timestamp and child context', () => {
    const { lines, stream } = sink();
    const log = new Logger({ level: LogLevel.INFO, name: 'router', stream });
    log.child({ app: 'shop' }).child({ part: 'api' }).info('ready');

    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'INFO', msg: 'ready', name: 'router', app: 'shop', part: 'api' });
    expect(typeof entry.time).toBe('number');
  });

  test('createLogger defaults to info', () => {
    expect(createLogger().level).toBe(LogLevel.INFO);
  });

  test('noopLogger is never enabled', () => {
    expect(noopLogger.enabled(LogLevel.ERROR)).toBe(false);
    expect(noopLogger.child({ a: 1 })).toBe(noopLogger);
  });
});

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, defaultLogLevel } from './logger.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('defaultLogLevel', () => {
  it('defaults to warn', () => {
    vi.stubEnv('OPENDOTA_LOG_LEVEL', '');
    expect(defaultLogLevel()).toBe('warn');
  });

  it('reads OPENDOTA_LOG_LEVEL', () => {
    vi.stubEnv('OPENDOTA_LOG_LEVEL', ' DEBUG ');
    expect(defaultLogLevel()).toBe('debug');
  });

  it('ignores unknown levels', () => {
    vi.stubEnv('OPENDOTA_LOG_LEVEL', 'verbose');
    expect(defaultLogLevel()).toBe('warn');
  });
});

describe('createLogger', () => {
  it('writes JSON lines with a textual level', () => {
    const lines: Array<string> = [];
    const logger = createLogger({
      level: 'info',
      name: 'test',
      destination: { write: (line: string) => void lines.push(line) },
    });

    logger.info({ hash: 'abc' }, 'cache hit');
    logger.debug('dropped');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'info',
      name: 'test',
      hash: 'abc',
      msg: 'cache hit',
    });
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatLogLine, getLogLevel, log, setLogLevel } from '../src/shared/logging.js';

afterEach(() => {
  setLogLevel('info');
  vi.restoreAllMocks();
});

describe('logging', () => {
  it('formats scope, level and data on one line', () => {
    expect(formatLogLine({ scope: 'dispatch', message: 'unit failed', level: 'error', data: { firstPage: 3 } }, '2026-01-01T00:00:00.000Z')).toBe(
      '[2026-01-01T00:00:00.000Z] [ERROR] [dispatch] unit failed {"firstPage":3}'
    );
    expect(formatLogLine({ scope: 'cli', message: 'ready' }, 'T')).toBe('[T] [INFO] [cli] ready');
  });

  it('drops entries below the threshold and writes the rest to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');

    log({ scope: 'test', message: 'quiet', level: 'info' });
    log({ scope: 'test', message: 'loud', level: 'error' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/\[ERROR\] \[test\] loud$/);
  });
});

import { resolveLogLevel } from '../../../src/shared/logger.js';

describe('resolveLogLevel', () => {
  it('defaults to warn when LOG_LEVEL is unset', () => {
    expect(resolveLogLevel(undefined)).toBe('warn');
  });

  it('accepts pino levels regardless of case', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel(' ERROR ')).toBe('error');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to warn for an unknown level', () => {
    expect(resolveLogLevel('verbose')).toBe('warn');
    expect(resolveLogLevel('')).toBe('warn');
    expect(resolveLogLevel('toString')).toBe('warn');
  });
});

import { describe, expect, it } from 'vitest';

import { parseCacheTtlMs, parseDurationMs, parseDurationMsStrict } from '../../cache/ttl.js';
import { RecognizerError } from '../../errors.js';

describe('ttl duration parsing', () => {
  it('reads bare numbers as seconds', () => {
    expect(parseDurationMs(90)).toBe(90_000);
    expect(parseDurationMs('90')).toBe(90_000);
    expect(parseDurationMs('0.5')).toBe(500);
  });

  it('reads bare numbers as milliseconds when asked', () => {
    expect(parseDurationMs(1500, { bareUnit: 'ms' })).toBe(1500);
  });

  it('parses duration units', () => {
    expect(parseDurationMs('250ms')).toBe(250);
    expect(parseDurationMs('1.5s')).toBe(1500);
    expect(parseDurationMs('2m')).toBe(120_000);
    expect(parseDurationMs('1h')).toBe(3_600_000);
    expect(parseDurationMs('1d')).toBe(86_400_000);
    expect(parseDurationMs('1w')).toBe(7 * 24 * 60 * 60 * 1000);
    expect(parseDurationMs(' 15M ')).toBe(900_000);
  });

  it('rejects malformed and negative values', () => {
    expect(parseDurationMs('soon')).toBeUndefined();
    expect(parseDurationMs('1mo')).toBeUndefined();
    expect(parseDurationMs(-5)).toBeUndefined();
    expect(parseDurationMs('')).toBeUndefined();
    expect(parseDurationMs(undefined)).toBeUndefined();
  });

  it('only accepts off for cache ttls', () => {
    expect(parseDurationMs('off')).toBeUndefined();
    expect(parseCacheTtlMs('off')).toBe(0);
    expect(parseCacheTtlMs(' OFF ')).toBe(0);
    expect(parseCacheTtlMs(3600)).toBe(3_600_000);
  });

  it('raises invalid_parameter from the strict variant', () => {
    expect(() => parseDurationMsStrict('soon', 'cache.ttl')).toThrow(RecognizerError);
    try {
      parseDurationMsStrict('off', 'logging.slow_threshold');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(RecognizerError);
      if (e instanceof RecognizerError) {
        expect(e.kind).toBe('invalid_parameter');
        expect(e.details).toEqual({ path: 'logging.slow_threshold', value: 'off' });
      }
    }
    expect(parseDurationMsStrict('off', 'cache.ttl', { allowOff: true })).toBe(0);
  });
});

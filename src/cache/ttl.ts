import { invalidParameter } from '../errors.js';

export type DurationInput = number | string | null | undefined;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Parses a duration into milliseconds. Bare numbers (and numeric strings)
 * are read in `bareUnit`, which defaults to seconds.
 */
export const parseDurationMs = (
  value: DurationInput,
  opts?: { allowOff?: boolean; bareUnit?: 'ms' | 's' },
): number | undefined => {
  if (value === undefined || value === null) return undefined;
  const bareFactor = UNIT_TO_MS[opts?.bareUnit ?? 's'];
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value * bareFactor);
  }
  if (typeof value !== 'string') return undefined;
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (lowered === 'off') return opts?.allowOff === true ? 0 : undefined;
  if (/^\d+(\.\d+)?$/.test(lowered)) {
    return Math.trunc(Number.parseFloat(lowered) * bareFactor);
  }
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h|d|w)$/.exec(lowered);
  if (match === null) return undefined;
  const amount = Number.parseFloat(match[1]);
  const ms = amount * UNIT_TO_MS[match[2]];
  if (!Number.isFinite(ms) || ms < 0) return undefined;
  return Math.trunc(ms);
};

/** Cache TTL: seconds, a duration like 90s/15m/1h, or 'off' (returned as 0). */
export const parseCacheTtlMs = (value: DurationInput): number | undefined => (
  parseDurationMs(value, { allowOff: true, bareUnit: 's' })
);

export const parseDurationMsStrict = (value: DurationInput, context: string, opts?: { allowOff?: boolean }): number => {
  const parsed = parseDurationMs(value, opts);
  if (parsed === undefined) {
    const offHint = opts?.allowOff === true ? "'off', " : '';
    throw invalidParameter(`${context} must be ${offHint}a number of seconds or a duration like 90s/15m/1h`, { path: context, value });
  }
  return parsed;
};

import { describe, expect, it } from 'vitest';

import { formatLogfmt } from '../../logging/logfmt.js';
import { buildStructuredLogEvent } from '../../logging/structured-log-event.js';
import { StructuredLogger } from '../../logging/structured-logger.js';

const TS = Date.UTC(2024, 0, 2, 3, 4, 5, 6);

describe('formatLogfmt', () => {
  it('renders fixed keys first and the message last', () => {
    const event = buildStructuredLogEvent({
      timestamp: TS,
      severity: 'VRB',
      component: 'dispatcher',
      message: 'recognition completed',
      challengeType: 'text',
      contentHash: 'abc123',
      durationMs: 12,
      cacheHit: false,
    }, { labels: { host: 'box-1' } });
    expect(formatLogfmt(event)).toBe(
      'ts=2024-01-02T03:04:05.006Z level=vrb priority=6 component=dispatcher challenge_type=text '
      + 'content_hash=abc123 duration_ms=12 cache_hit=false host=box-1 message="recognition completed"',
    );
  });

  it('escapes quotes and newlines', () => {
    const event = buildStructuredLogEvent({
      timestamp: TS,
      severity: 'ERR',
      component: 'oracle',
      message: 'said "no"\nthen left',
    });
    expect(formatLogfmt(event)).toBe(
      'ts=2024-01-02T03:04:05.006Z level=err priority=3 component=oracle message="said \\"no\\"\\nthen left"',
    );
  });

  it('promotes scalar details to labels without overriding reserved keys', () => {
    const event = buildStructuredLogEvent({
      timestamp: TS,
      severity: 'WRN',
      component: 'cache',
      message: 'x',
      details: { reason: 'lock', attempts: 2, level: 'sneaky', nested: { a: 1 } },
    });
    expect(event.labels).toEqual({ reason: 'lock', attempts: '2' });
  });
});

describe('StructuredLogger', () => {
  const capture = (options: ConstructorParameters<typeof StructuredLogger>[0]) => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      ...options,
      logfmtWriter: (line) => { lines.push(line); },
      jsonWriter: (line) => { lines.push(line); },
    });
    return { lines, logger };
  };

  it('drops entries below the configured level', () => {
    const { lines, logger } = capture({ level: 'warning' });
    logger.trace({ component: 'cache', message: 'a' });
    logger.info({ component: 'cache', message: 'b' });
    logger.warn({ component: 'cache', message: 'c' });
    logger.error({ component: 'cache', message: 'd' });
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('message=c');
    expect(lines[1]).toContain('message=d');
  });

  it('writes one JSON object per line', () => {
    const { lines, logger } = capture({ format: 'json' });
    logger.warn({ component: 'cache', message: 'slow', timestamp: TS, errorCode: 4001, details: { key: 'k' } });
    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      ts: '2024-01-02T03:04:05.006Z',
      timestamp: TS,
      severity: 'WRN',
      level: 'wrn',
      priority: 4,
      component: 'cache',
      error_code: 4001,
      labels: { key: 'k' },
      message: 'slow',
    });
  });

  it('emits nothing with format none', () => {
    const { lines, logger } = capture({ format: 'none', level: 'debug' });
    logger.error({ component: 'cli', message: 'x' });
    expect(lines).toHaveLength(0);
    expect(logger.isEnabled('ERR')).toBe(false);
  });
});

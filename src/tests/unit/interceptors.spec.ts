import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { InterceptorContext, RecognitionOutcome } from '../../dispatcher.js';

import { imageTooLarge } from '../../errors.js';
import { createLoggingInterceptor, createTelemetryInterceptor } from '../../interceptors.js';
import { StructuredLogger } from '../../logging/structured-logger.js';
import { recordRecognitionMetrics } from '../../telemetry/index.js';

vi.mock('../../telemetry/index.js', async (importOriginal) => ({
  ...await importOriginal<typeof import('../../telemetry/index.js')>(),
  recordRecognitionMetrics: vi.fn(),
}));

beforeEach(() => {
  vi.resetAllMocks();
});

const ctx: InterceptorContext = {
  request: { image: Buffer.alloc(4), challengeType: 'text', params: {} },
  startedAt: 0,
};

const outcome: RecognitionOutcome = {
  result: 'AB12',
  cacheHit: false,
  challengeType: 'text',
  contentHash: 'abc',
  paramsDigest: 'def',
  durationMs: 0,
};

const makeClock = () => {
  let current = 1000;
  return { now: () => current, advance: (ms: number) => { current += ms; } };
};

const captureLogger = () => {
  const lines: string[] = [];
  const logger = new StructuredLogger({ logfmtWriter: (line) => { lines.push(line.trimEnd()); } });
  return { lines, logger };
};

describe('createLoggingInterceptor', () => {
  it('logs successful calls at VRB with timing and cache outcome', async () => {
    const clock = makeClock();
    const { lines, logger } = captureLogger();
    const interceptor = createLoggingInterceptor(logger, { slowThresholdMs: 100, now: clock.now });

    const result = await interceptor(ctx, () => {
      clock.advance(10);
      return Promise.resolve(outcome);
    });

    expect(result).toBe(outcome);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^ts=\S+ level=vrb priority=6 component=dispatcher challenge_type=text content_hash=abc duration_ms=10 cache_hit=false message="recognition completed"$/);
  });

  it('logs slow calls at WRN', async () => {
    const clock = makeClock();
    const { lines, logger } = captureLogger();
    const interceptor = createLoggingInterceptor(logger, { slowThresholdMs: 100, now: clock.now });

    await interceptor(ctx, () => {
      clock.advance(250);
      return Promise.resolve(outcome);
    });

    expect(lines[0]).toContain('level=wrn');
    expect(lines[0]).toContain('duration_ms=250');
    expect(lines[0]).toContain('slowThresholdMs=100');
    expect(lines[0]).toContain('message="slow recognition"');
  });

  it('logs failures at ERR with the numeric code and rethrows', async () => {
    const { lines, logger } = captureLogger();
    const interceptor = createLoggingInterceptor(logger);
    const failure = imageTooLarge(20, 10);

    await expect(interceptor(ctx, () => Promise.reject(failure))).rejects.toBe(failure);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('level=err');
    expect(lines[0]).toContain('error_code=3002');
    expect(lines[0]).toContain('kind=image_too_large');
  });
});

describe('createTelemetryInterceptor', () => {
  it('records a success with its cache outcome', async () => {
    const clock = makeClock();
    const interceptor = createTelemetryInterceptor({ customLabels: { env: 'test' }, now: clock.now });

    await interceptor(ctx, () => {
      clock.advance(5);
      return Promise.resolve({ ...outcome, cacheHit: true });
    });

    expect(vi.mocked(recordRecognitionMetrics)).toHaveBeenCalledWith({
      challengeType: 'text',
      status: 'success',
      cacheHit: true,
      errorCode: undefined,
      latencyMs: 5,
      customLabels: { env: 'test' },
    });
  });

  it('records a failure with its error code', async () => {
    const interceptor = createTelemetryInterceptor({ now: () => 0 });

    await expect(interceptor(ctx, () => Promise.reject(imageTooLarge(20, 10)))).rejects.toMatchObject({ code: 3002 });
    expect(vi.mocked(recordRecognitionMetrics)).toHaveBeenCalledWith({
      challengeType: 'text',
      status: 'error',
      cacheHit: undefined,
      errorCode: 3002,
      latencyMs: 0,
      customLabels: undefined,
    });
  });
});

import type { RecognitionInterceptor, RecognitionOutcome } from './dispatcher.js';
import type { StructuredLogger } from './logging/structured-logger.js';

import { classifyError } from './errors.js';
import { recordRecognitionMetrics, runWithSpan } from './telemetry/index.js';
import { elapsedMs } from './utils.js';

export interface LoggingInterceptorOptions {
  /** Successful requests slower than this are logged at WRN. */
  slowThresholdMs?: number;
  now?: () => number;
}

export const DEFAULT_SLOW_THRESHOLD_MS = 2000;

export function createLoggingInterceptor(logger: StructuredLogger, options: LoggingInterceptorOptions = {}): RecognitionInterceptor {
  const slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
  const now = options.now ?? Date.now;
  return async (ctx, next) => {
    const startedAt = now();
    const challengeType = ctx.request.challengeType;
    let outcome: RecognitionOutcome;
    try {
      outcome = await next();
    } catch (e) {
      const error = classifyError(e);
      logger.error({
        component: 'dispatcher',
        message: `recognition failed: ${error.message}`,
        challengeType,
        errorCode: error.code,
        durationMs: elapsedMs(startedAt, now),
        details: { kind: error.kind, ...error.details },
        stack: error.kind === 'unknown_error' ? error.stack : undefined,
      });
      throw error;
    }
    const durationMs = elapsedMs(startedAt, now);
    const entry = {
      component: 'dispatcher' as const,
      challengeType,
      contentHash: outcome.contentHash,
      cacheHit: outcome.cacheHit,
      durationMs,
    };
    if (durationMs > slowThresholdMs) {
      logger.warn({ ...entry, message: 'slow recognition', details: { slowThresholdMs } });
    } else {
      logger.info({ ...entry, message: 'recognition completed' });
    }
    return outcome;
  };
}

export interface TelemetryInterceptorOptions {
  customLabels?: Record<string, string>;
  now?: () => number;
}

export function createTelemetryInterceptor(options: TelemetryInterceptorOptions = {}): RecognitionInterceptor {
  const now = options.now ?? Date.now;
  return async (ctx, next) => {
    const challengeType = ctx.request.challengeType;
    return await runWithSpan('captcha.recognize', { 'captcha.challenge_type': challengeType }, async (span) => {
      const startedAt = now();
      let status: 'success' | 'error' = 'error';
      let cacheHit: boolean | undefined;
      let errorCode: number | undefined;
      try {
        const outcome = await next();
        status = 'success';
        cacheHit = outcome.cacheHit;
        span.setAttribute('captcha.cache_hit', outcome.cacheHit);
        return outcome;
      } catch (e) {
        const error = classifyError(e);
        errorCode = error.code;
        span.setAttribute('captcha.error_code', error.code);
        throw error;
      } finally {
        recordRecognitionMetrics({
          challengeType,
          status,
          cacheHit,
          errorCode,
          latencyMs: elapsedMs(startedAt, now),
          customLabels: options.customLabels,
        });
      }
    });
  };
}

import { metrics as otelMetrics, trace as otelTrace, SpanStatusCode } from '@opentelemetry/api';

import type { Attributes, Counter, Histogram, Meter, Span } from '@opentelemetry/api';

export interface TelemetryRuntimeConfig {
  enabled: boolean;
  labels?: Record<string, string>;
}

export interface RecognitionMetricsRecord {
  challengeType: string;
  status: 'success' | 'error';
  cacheHit?: boolean;
  errorCode?: number;
  latencyMs: number;
  customLabels?: Record<string, string>;
}

interface TelemetryRecorder {
  recordRecognitionMetrics: (record: RecognitionMetricsRecord) => void;
}

class NoopRecorder implements TelemetryRecorder {
  recordRecognitionMetrics = (_record: RecognitionMetricsRecord): void => { /* noop */ };
}

interface RecognitionInstruments {
  recognitions: Counter;
  errors: Counter;
  cacheLookups: Counter;
  latency: Histogram;
}

// Instruments go through the global MeterProvider; the host process owns SDK and exporter setup.
class OtelMetricsRecorder implements TelemetryRecorder {
  private readonly instruments: RecognitionInstruments;

  constructor(meter: Meter, private readonly baseLabels: Record<string, string>) {
    this.instruments = {
      recognitions: meter.createCounter('captcha_ocr_recognitions_total', { description: 'Total number of recognition requests' }),
      errors: meter.createCounter('captcha_ocr_recognition_errors_total', { description: 'Total number of failed recognition requests' }),
      cacheLookups: meter.createCounter('captcha_ocr_cache_lookups_total', { description: 'Result cache lookups by outcome' }),
      latency: meter.createHistogram('captcha_ocr_recognition_latency_ms', { description: 'Latency of recognition requests (milliseconds)' }),
    };
  }

  recordRecognitionMetrics = (record: RecognitionMetricsRecord): void => {
    const labels = buildLabelSet({ challenge_type: record.challengeType, status: record.status }, this.baseLabels, record.customLabels);
    this.instruments.recognitions.add(1, labels);
    this.instruments.latency.record(record.latencyMs, labels);
    if (record.cacheHit !== undefined) {
      this.instruments.cacheLookups.add(1, { ...labels, outcome: record.cacheHit ? 'hit' : 'miss' });
    }
    if (record.status === 'error') {
      this.instruments.errors.add(1, { ...labels, error_code: String(record.errorCode ?? 'unknown') });
    }
  };
}

const METER_NAME = 'captcha-ocr';
const TRACER_NAME = 'captcha-ocr';

let recorder: TelemetryRecorder = new NoopRecorder();

export function initTelemetry(config: TelemetryRuntimeConfig): void {
  recorder = config.enabled
    ? new OtelMetricsRecorder(otelMetrics.getMeter(METER_NAME), { ...(config.labels ?? {}) })
    : new NoopRecorder();
}

export function shutdownTelemetry(): void {
  recorder = new NoopRecorder();
}

export function recordRecognitionMetrics(record: RecognitionMetricsRecord): void {
  recorder.recordRecognitionMetrics(record);
}

export function runWithSpan<T>(name: string, attributes: Attributes, fn: (span: Span) => Promise<T>): Promise<T> {
  const tracer = otelTrace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn(span);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

function buildLabelSet(
  base: Record<string, string>,
  global: Record<string, string>,
  custom?: Record<string, string>
): Record<string, string> {
  const labels: Record<string, string> = { ...global, ...base };
  if (custom !== undefined) {
    Object.entries(custom).forEach(([key, value]) => {
      if (value.length > 0) labels[key] = value;
    });
  }
  return labels;
}

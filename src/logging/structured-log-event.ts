import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  component: LogEntry['component'];
  message: string;
  challengeType?: string;
  contentHash?: string;
  errorCode?: number;
  durationMs?: number;
  cacheHit?: boolean;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'component',
  'challenge_type',
  'content_hash',
  'error_code',
  'duration_ms',
  'cache_hit',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

const toLabelValue = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Number.isInteger(value) ? String(value) : value.toString();
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return undefined;
};

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      const label = toLabelValue(value);
      if (label === undefined) return;
      if (!Object.prototype.hasOwnProperty.call(labels, key)) labels[key] = label;
    });
  }

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    component: entry.component,
    message: entry.message,
    challengeType: entry.challengeType,
    contentHash: entry.contentHash,
    errorCode: entry.errorCode,
    durationMs: entry.durationMs,
    cacheHit: entry.cacheHit,
    labels: filteredLabels,
    stack: entry.stack,
  };
}

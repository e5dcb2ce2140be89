import type { LogEntry, LogFormat, LogLevel, LogSeverity } from '../types.js';

import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  labels?: Record<string, string>;
  color?: boolean;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
}

export type LogInput = Omit<LogEntry, 'timestamp' | 'severity'> & { timestamp?: number };

const SEVERITY_RANK: Record<LogSeverity, number> = {
  TRC: 0,
  VRB: 1,
  WRN: 2,
  ERR: 3,
};

const MIN_RANK_BY_LEVEL: Record<LogLevel, number> = {
  debug: SEVERITY_RANK.TRC,
  info: SEVERITY_RANK.VRB,
  warning: SEVERITY_RANK.WRN,
  error: SEVERITY_RANK.ERR,
};

export class StructuredLogger {
  readonly format: LogFormat;
  readonly level: LogLevel;
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly minRank: number;

  constructor(options: StructuredLoggerOptions = {}) {
    this.format = options.format ?? 'logfmt';
    this.level = options.level ?? 'info';
    this.labels = options.labels ?? {};
    this.minRank = MIN_RANK_BY_LEVEL[this.level];
    const color = options.color ?? false;

    if (this.format === 'logfmt') {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color })}\n`);
      });
    }
    if (this.format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
  }

  isEnabled(severity: LogSeverity): boolean {
    return this.sinks.length > 0 && SEVERITY_RANK[severity] >= this.minRank;
  }

  emit(entry: LogEntry): void {
    if (!this.isEnabled(entry.severity)) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  trace(input: LogInput): void { this.emit(this.toEntry('TRC', input)); }

  info(input: LogInput): void { this.emit(this.toEntry('VRB', input)); }

  warn(input: LogInput): void { this.emit(this.toEntry('WRN', input)); }

  error(input: LogInput): void { this.emit(this.toEntry('ERR', input)); }

  private toEntry(severity: LogSeverity, input: LogInput): LogEntry {
    return { ...input, severity, timestamp: input.timestamp ?? Date.now() };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(options);
}

/** A logger that drops everything; the default when none is supplied. */
export const silentLogger = (): StructuredLogger => new StructuredLogger({ format: 'none' });

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; nothing left to report to
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('component', event.component);
  push('challenge_type', event.challengeType);
  push('content_hash', event.contentHash);
  push('error_code', event.errorCode);
  push('duration_ms', event.durationMs);
  push('cache_hit', event.cacheHit);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}

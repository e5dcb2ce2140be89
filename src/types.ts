// Shared types for logging and resolved configuration.

export type LogSeverity = 'TRC' | 'VRB' | 'WRN' | 'ERR';

export type LogComponent = 'dispatcher' | 'cache' | 'oracle' | 'image' | 'config' | 'cli';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  component: LogComponent;
  message: string;
  challengeType?: string;
  contentHash?: string;
  errorCode?: number;
  durationMs?: number;
  cacheHit?: boolean;
  // Scalar extras are promoted to labels; nested values are ignored by the sinks.
  details?: Record<string, unknown>;
  stack?: string;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export type LogFormat = 'logfmt' | 'json' | 'none';

export interface RecognitionSettings {
  defaultType: string;
  maxImageSize: number;
  minImageSize: number;
  supportedFormats: string[];
  timeoutMs: number;
  validateImages: boolean;
}

export interface CacheSettings {
  enabled: boolean;
  maxSize: number;
  ttlMs: number;
  dedupeInFlight: boolean;
}

export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
  slowThresholdMs: number;
}

export interface OracleSettings {
  command?: string;
  args: string[];
}

export interface TelemetrySettings {
  enabled: boolean;
  labels: Record<string, string>;
}

export interface Configuration {
  app: { name: string; version: string };
  recognition: RecognitionSettings;
  cache: CacheSettings;
  logging: LoggingSettings;
  oracle: OracleSettings;
  telemetry: TelemetrySettings;
}

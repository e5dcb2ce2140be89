import fs from 'node:fs';
import path from 'node:path';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { Configuration } from './types.js';

import { parseCacheTtlMs, parseDurationMs } from './cache/ttl.js';
import { classifyError, invalidParameter } from './errors.js';
import { DEFAULT_MAX_IMAGE_BYTES, DEFAULT_SUPPORTED_FORMATS } from './image/image-loader.js';
import { isPlainObject } from './utils.js';
import { VERSION } from './version.js';

// Looked up relative to the working directory, first match wins.
export const CONFIG_SEARCH_PATHS: readonly string[] = [
  'config/config.yaml',
  'config/config.yml',
  'config.yaml',
  'config.yml',
  'config.json',
];

// On-disk shape (snake_case), before defaults are folded in.
export const DEFAULT_RAW_CONFIG = {
  app: { name: 'captcha-ocr', version: VERSION },
  recognition: {
    default_type: 'text',
    max_image_size: DEFAULT_MAX_IMAGE_BYTES,
    min_image_size: 1,
    supported_formats: [...DEFAULT_SUPPORTED_FORMATS],
    timeout: 30,
    validate_images: true,
  },
  cache: { enabled: true, max_size: 1000, ttl: 3600, dedupe_in_flight: false },
  logging: { level: 'info', format: 'logfmt', slow_threshold: 2 },
  oracle: { args: [] },
  telemetry: { enabled: false, labels: {} },
} as const;

const durationField = (field: string, opts: { allowOff: boolean }) =>
  z.union([z.number(), z.string()]).transform((value, ctx) => {
    const ms = opts.allowOff ? parseCacheTtlMs(value) : parseDurationMs(value, { bareUnit: 's' });
    const isOff = typeof value === 'string' && value.trim().toLowerCase() === 'off';
    if (ms === undefined || (ms <= 0 && !isOff)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${field} must be ${opts.allowOff ? "'off', " : ''}a positive number of seconds or a duration like 90s/15m/1h`,
      });
      return z.NEVER;
    }
    return ms;
  });

const LogLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['debug', 'info', 'warning', 'error']),
);

const RawConfigSchema = z.object({
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  recognition: z.object({
    default_type: z.string().min(1),
    max_image_size: z.number().int().positive(),
    min_image_size: z.number().int().positive(),
    supported_formats: z.array(z.string().min(1)).min(1),
    timeout: z.number().positive(),
    validate_images: z.boolean(),
  }).refine((r) => r.min_image_size <= r.max_image_size, {
    message: 'min_image_size must not exceed max_image_size',
    path: ['min_image_size'],
  }),
  cache: z.object({
    enabled: z.boolean(),
    max_size: z.number().int().positive(),
    ttl: durationField('ttl', { allowOff: true }),
    dedupe_in_flight: z.boolean(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: z.enum(['logfmt', 'json', 'none']),
    slow_threshold: durationField('slow_threshold', { allowOff: false }),
  }),
  oracle: z.object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()),
  }),
  telemetry: z.object({
    enabled: z.boolean(),
    labels: z.record(z.string(), z.string()),
  }),
});

export interface LoadConfigurationOptions {
  /** Explicit file; must exist. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfiguration {
  config: Configuration;
  /** File the values came from; undefined when only defaults and env applied. */
  source?: string;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function resolveConfigPath(options: LoadConfigurationOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  if (options.path !== undefined) return path.resolve(cwd, options.path);
  return CONFIG_SEARCH_PATHS
    .map((candidate) => path.resolve(cwd, candidate))
    .find((candidate) => fs.existsSync(candidate));
}

export function loadConfiguration(options: LoadConfigurationOptions = {}): LoadedConfiguration {
  const env = options.env ?? process.env;
  const source = resolveConfigPath(options);
  const fileValues = source !== undefined ? readConfigFile(source, env) : {};
  const merged = deepMerge(DEFAULT_RAW_CONFIG, fileValues);
  applyEnvOverrides(merged, env);
  return { config: parseConfiguration(merged, source ?? 'defaults'), source };
}

export function defaultConfiguration(): Configuration {
  return parseConfiguration(deepMerge(DEFAULT_RAW_CONFIG, {}), 'defaults');
}

function readConfigFile(file: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw classifyError(e);
  }
  let doc: unknown;
  try {
    doc = yaml.load(text, { filename: file });
  } catch (e) {
    throw invalidParameter(`Configuration file could not be parsed: ${file}`, { path: file }, e);
  }
  if (doc === undefined || doc === null) return {};
  if (!isPlainObject(doc)) {
    throw invalidParameter(`Configuration file must contain a mapping: ${file}`, { path: file });
  }
  const expanded = expandPlaceholders(doc, env, file, []);
  return isPlainObject(expanded) ? expanded : {};
}

function expandPlaceholders(value: unknown, env: NodeJS.ProcessEnv, file: string, at: string[]): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw invalidParameter(`Unresolved variable \${${name}} at ${at.join('.')} in ${file}`, {
          path: file,
          key: at.join('.'),
          variable: name,
        });
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) return value.map((item, index) => expandPlaceholders(item, env, file, [...at, String(index)]));
  if (isPlainObject(value)) {
    return Object.entries(value).reduce<Record<string, unknown>>((acc, [key, item]) => {
      acc[key] = expandPlaceholders(item, env, file, [...at, key]);
      return acc;
    }, {});
  }
  return value;
}

// Plain objects merge key by key; anything else (arrays included) replaces.
export function deepMerge(base: unknown, overlay: unknown): Record<string, unknown> {
  const result: Record<string, unknown> = isPlainObject(base) ? { ...base } : {};
  if (!isPlainObject(overlay)) return result;
  Object.entries(overlay).forEach(([key, value]) => {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  });
  return result;
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

type EnvCoercion = 'boolean' | 'number' | 'string' | 'duration';

const ENV_OVERRIDES: readonly { name: string; section: string; key: string; coerce: EnvCoercion }[] = [
  { name: 'CACHE_ENABLED', section: 'cache', key: 'enabled', coerce: 'boolean' },
  { name: 'CACHE_MAX_SIZE', section: 'cache', key: 'max_size', coerce: 'number' },
  { name: 'CACHE_TTL', section: 'cache', key: 'ttl', coerce: 'duration' },
  { name: 'RECOGNITION_TIMEOUT', section: 'recognition', key: 'timeout', coerce: 'number' },
  { name: 'LOG_LEVEL', section: 'logging', key: 'level', coerce: 'string' },
  { name: 'LOG_FORMAT', section: 'logging', key: 'format', coerce: 'string' },
  { name: 'OCR_COMMAND', section: 'oracle', key: 'command', coerce: 'string' },
  { name: 'TELEMETRY_ENABLED', section: 'telemetry', key: 'enabled', coerce: 'boolean' },
];

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

const coerceEnvValue = (name: string, raw: string, coerce: EnvCoercion): unknown => {
  const trimmed = raw.trim();
  switch (coerce) {
    case 'boolean': {
      const lowered = trimmed.toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      throw invalidParameter(`${name} must be a boolean (true/false)`, { variable: name, value: raw });
    }
    case 'number': {
      const parsed = Number(trimmed);
      if (trimmed.length === 0 || !Number.isFinite(parsed)) {
        throw invalidParameter(`${name} must be a number`, { variable: name, value: raw });
      }
      return parsed;
    }
    case 'duration':
      return /^\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : trimmed;
    case 'string':
      return trimmed;
  }
};

function applyEnvOverrides(target: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  ENV_OVERRIDES.forEach(({ name, section, key, coerce }) => {
    const raw = env[name];
    if (raw === undefined || raw.trim().length === 0) return;
    const current = target[section];
    const sectionValues: Record<string, unknown> = isPlainObject(current) ? { ...current } : {};
    sectionValues[key] = coerceEnvValue(name, raw, coerce);
    target[section] = sectionValues;
  });
}

// ---------------------------------------------------------------------------
// Validation and normalization
// ---------------------------------------------------------------------------

const normalizeFormats = (formats: readonly string[]): string[] => (
  Array.from(new Set(formats.map((format) => {
    const lowered = format.trim().toLowerCase();
    return lowered === 'jpg' ? 'jpeg' : lowered;
  })))
);

export function parseConfiguration(raw: unknown, source: string): Configuration {
  const parsed = RawConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`);
    throw invalidParameter(`Configuration validation failed in ${source}:\n${issues.map((line) => `  ${line}`).join('\n')}`, {
      source,
      issues,
    });
  }
  const data = parsed.data;
  return {
    app: { name: data.app.name, version: data.app.version },
    recognition: {
      defaultType: data.recognition.default_type,
      maxImageSize: data.recognition.max_image_size,
      minImageSize: data.recognition.min_image_size,
      supportedFormats: normalizeFormats(data.recognition.supported_formats),
      timeoutMs: Math.round(data.recognition.timeout * 1000),
      validateImages: data.recognition.validate_images,
    },
    cache: {
      // ttl 'off' parses to 0 and turns caching off
      enabled: data.cache.enabled && data.cache.ttl > 0,
      maxSize: data.cache.max_size,
      ttlMs: data.cache.ttl,
      dedupeInFlight: data.cache.dedupe_in_flight,
    },
    logging: {
      level: data.logging.level,
      format: data.logging.format,
      slowThresholdMs: data.logging.slow_threshold,
    },
    oracle: {
      command: data.oracle.command,
      args: [...data.oracle.args],
    },
    telemetry: {
      enabled: data.telemetry.enabled,
      labels: { ...data.telemetry.labels },
    },
  };
}

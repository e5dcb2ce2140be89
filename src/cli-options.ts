import { InvalidArgumentError } from 'commander';

import type { RecognitionParams } from './cache/types.js';
import type { RecognitionOutcome } from './dispatcher.js';
import type { ImageInput } from './image/image-loader.js';
import type { PreprocessOptions } from './image/preprocess.js';
import type { ResultClass } from './result-classifier.js';
import type { Configuration } from './types.js';

import { toErrorResponse, toSuccessResponse } from './errors.js';
import { DEFAULT_PREPROCESS_OPTIONS } from './image/preprocess.js';

// Flag values as commander hands them to the `recognize` action.
export interface RecognizeCliOptions {
  type?: string;
  config?: string;
  oracleCommand?: string;
  oracleArg: string[];
  timeout?: number;
  returnExpression?: boolean;
  asFloat?: boolean;
  keepSpaces?: boolean;
  lower?: boolean;
  upper?: boolean;
  preprocess?: boolean;
  grayscale: boolean;
  contrast?: number;
  sharpness?: number;
  noise?: 'median' | 'gaussian' | 'none';
  threshold?: number;
  classify?: boolean;
  json?: boolean;
  stats?: boolean;
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

export const parseNumberOption = (value: string): number => {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
};

export const parsePositiveNumberOption = (value: string): number => {
  const parsed = parseNumberOption(value);
  if (parsed <= 0) throw new InvalidArgumentError('Expected a positive number.');
  return parsed;
};

export const parseThresholdOption = (value: string): number => {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 255) {
    throw new InvalidArgumentError('Expected an integer in 0..255.');
  }
  return parsed;
};

export const collectOption = (value: string, previous: string[]): string[] => [...previous, value];

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

/** Only flags the user actually set end up in the params, so defaults share cache entries. */
export function buildRecognitionParams(challengeType: string, options: RecognizeCliOptions): RecognitionParams {
  const params: Record<string, unknown> = {};
  if (challengeType === 'text') {
    if (options.keepSpaces === true) params.removeSpaces = false;
    if (options.lower === true) params.toLower = true;
    if (options.upper === true) params.toUpper = true;
  }
  if (challengeType === 'calculation') {
    if (options.returnExpression === true) params.returnType = 'expression';
    if (options.asFloat === true) params.asInt = false;
  }
  return params;
}

export function buildPreprocessOptions(options: RecognizeCliOptions): PreprocessOptions | undefined {
  if (options.preprocess !== true) return undefined;
  const noise = options.noise ?? DEFAULT_PREPROCESS_OPTIONS.denoise;
  return {
    grayscale: options.grayscale,
    contrast: options.contrast ?? DEFAULT_PREPROCESS_OPTIONS.contrast,
    sharpness: options.sharpness ?? DEFAULT_PREPROCESS_OPTIONS.sharpness,
    denoise: noise === 'none' ? undefined : noise,
    threshold: options.threshold,
  };
}

export function applyCliOverrides(config: Configuration, options: RecognizeCliOptions): Configuration {
  return {
    ...config,
    recognition: {
      ...config.recognition,
      defaultType: options.type ?? config.recognition.defaultType,
      timeoutMs: options.timeout !== undefined ? Math.round(options.timeout * 1000) : config.recognition.timeoutMs,
    },
    oracle: {
      command: options.oracleCommand ?? config.oracle.command,
      args: options.oracleArg.length > 0 ? [...options.oracleArg] : [...config.oracle.args],
    },
  };
}

export function imageInputFromArgument(argument: string): ImageInput {
  if (argument.startsWith('data:')) return { kind: 'base64', data: argument };
  return { kind: 'path', path: argument };
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface RecognizedLine {
  image: string;
  outcome: RecognitionOutcome;
  resultClass?: ResultClass;
}

export function formatSuccessLine(line: RecognizedLine, json: boolean): string {
  if (json) {
    return JSON.stringify(toSuccessResponse({
      image: line.image,
      result: line.outcome.result,
      challenge_type: line.outcome.challengeType,
      cache_hit: line.outcome.cacheHit,
      ...(line.resultClass !== undefined ? { result_class: line.resultClass } : {}),
    }));
  }
  return line.resultClass !== undefined ? `${line.outcome.result}\t${line.resultClass}` : line.outcome.result;
}

export function formatFailureLine(image: string, error: unknown, json: boolean): string {
  const response = toErrorResponse(error);
  if (json) return JSON.stringify({ ...response, image });
  return `${image}: error ${String(response.error_code)}: ${response.message}`;
}

import type { CacheStats, RecognitionParams } from './cache/types.js';
import type { RecognitionInterceptor, RecognitionOutcome } from './dispatcher.js';
import type { ImageInput, ImageLoader } from './image/image-loader.js';
import type { ChallengeType, OcrOracle } from './processors/types.js';
import type { Configuration } from './types.js';

import { ResultCache } from './cache/result-cache.js';
import { Dispatcher } from './dispatcher.js';
import { ERROR_KIND_MEANINGS } from './errors.js';
import { SharpImageLoader } from './image/image-loader.js';
import { createLoggingInterceptor, createTelemetryInterceptor } from './interceptors.js';
import { createStructuredLogger, type StructuredLogger } from './logging/structured-logger.js';
import { createDefaultRegistry, type ProcessorRegistry } from './processors/registry.js';

export interface RecognitionServiceOptions {
  config: Configuration;
  oracle: OcrOracle;
  logger?: StructuredLogger;
  imageLoader?: ImageLoader;
  /** Added inside the built-in logging and telemetry interceptors. */
  interceptors?: readonly RecognitionInterceptor[];
  now?: () => number;
}

export interface RecognitionServiceStats {
  cache?: CacheStats;
  knownTypes: string[];
  inFlight: number;
}

/** One isolated set of collaborators; two services never share state. */
export interface RecognitionService {
  readonly config: Configuration;
  readonly registry: ProcessorRegistry;
  readonly cache?: ResultCache;
  readonly dispatcher: Dispatcher;
  readonly logger: StructuredLogger;
  recognize: (image: ImageInput, challengeType?: ChallengeType, params?: RecognitionParams) => Promise<string>;
  recognizeDetailed: (image: ImageInput, challengeType?: ChallengeType, params?: RecognitionParams) => Promise<RecognitionOutcome>;
  stats: () => Promise<RecognitionServiceStats>;
}

export function createRecognitionService(options: RecognitionServiceOptions): RecognitionService {
  const { config, oracle } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? createStructuredLogger({
    format: config.logging.format,
    level: config.logging.level,
    labels: config.telemetry.labels,
  });

  const registry = createDefaultRegistry(oracle);
  const cache = config.cache.enabled
    ? new ResultCache({
      maxSize: config.cache.maxSize,
      ttlMs: config.cache.ttlMs,
      now,
      onAnomaly: (message, key) => {
        logger.warn({
          component: 'cache',
          message,
          challengeType: key.challengeType,
          contentHash: key.contentHash,
          errorCode: ERROR_KIND_MEANINGS.cache_error.code,
        });
      },
    })
    : undefined;
  const imageLoader = options.imageLoader ?? new SharpImageLoader({
    maxBytes: config.recognition.maxImageSize,
    minBytes: config.recognition.minImageSize,
    supportedFormats: config.recognition.supportedFormats,
    validate: config.recognition.validateImages,
  });

  const dispatcher = new Dispatcher({
    registry,
    cache,
    imageLoader,
    logger,
    now,
    dedupeInFlight: config.cache.dedupeInFlight,
    interceptors: [
      createLoggingInterceptor(logger, { slowThresholdMs: config.logging.slowThresholdMs, now }),
      createTelemetryInterceptor({ customLabels: config.telemetry.labels, now }),
      ...(options.interceptors ?? []),
    ],
  });

  const defaultType = config.recognition.defaultType;

  return {
    config,
    registry,
    cache,
    dispatcher,
    logger,
    recognize: (image, challengeType = defaultType, params = {}) => dispatcher.recognize(image, challengeType, params),
    recognizeDetailed: (image, challengeType = defaultType, params = {}) => dispatcher.recognizeDetailed(image, challengeType, params),
    stats: async () => ({
      cache: cache !== undefined ? await cache.stats() : undefined,
      knownTypes: registry.knownTypes(),
      inFlight: dispatcher.inFlightCount,
    }),
  };
}

// Main library exports for programmatic use
export { Dispatcher } from './dispatcher.js';
export { createRecognitionService } from './service.js';
export { ResultCache } from './cache/result-cache.js';
export { hashContent, sha256Hex } from './cache/hash.js';
export { canonicalizeParams, computeParamsDigest } from './cache/params-digest.js';
export { ProcessorRegistry, createDefaultRegistry, registerDefaultProcessors } from './processors/registry.js';
export { TextProcessor, parseTextParams, postProcessText } from './processors/text-processor.js';
export {
  CalculationProcessor,
  INFINITY_SENTINEL,
  evaluateExpression,
  interpretCalculation,
  normalizeCalculationText,
  parseCalculationParams,
  parseExpression,
} from './processors/calculation-processor.js';
export { SharpImageLoader, decodeBase64Image } from './image/image-loader.js';
export { preprocessImage } from './image/preprocess.js';
export { CommandOracle } from './oracle/command-oracle.js';
export { classifyResult } from './result-classifier.js';
export { createLoggingInterceptor, createTelemetryInterceptor } from './interceptors.js';
export { defaultConfiguration, loadConfiguration } from './config.js';
export { StructuredLogger, createStructuredLogger, silentLogger } from './logging/structured-logger.js';
export { initTelemetry, shutdownTelemetry } from './telemetry/index.js';
export {
  ERROR_KIND_MEANINGS,
  RecognizerError,
  classifyError,
  isRecognizerError,
  toErrorResponse,
  toSuccessResponse,
} from './errors.js';

// Type exports
export type {
  InterceptorContext,
  RecognitionInterceptor,
  RecognitionOutcome,
  RecognitionRequest,
  DispatcherOptions,
} from './dispatcher.js';
export type { RecognitionService, RecognitionServiceOptions, RecognitionServiceStats } from './service.js';
export type {
  CacheEntry,
  CacheKey,
  CacheStats,
  ContentHash,
  ParamsDigest,
  RecognitionParams,
  ResultCacheOptions,
} from './cache/types.js';
export type { ChallengeType, OcrOracle, Processor } from './processors/types.js';
export type { TextOptions } from './processors/text-processor.js';
export type { CalculationOptions, CalculationValue, ParsedExpression } from './processors/calculation-processor.js';
export type { ImageInput, ImageLoader, ImageSource } from './image/image-loader.js';
export type { PreprocessOptions } from './image/preprocess.js';
export type { ResultClass } from './result-classifier.js';
export type { ErrorResponse, RecognizerErrorKind, SuccessResponse } from './errors.js';
export type { Configuration, LogEntry, LogFormat, LogLevel } from './types.js';

/**
 * Dispatcher - recognition orchestration
 *
 * resolve processor → acquire bytes → hash → cache lookup → process →
 * cache store. Every failure leaves as a RecognizerError.
 */
import type { ResultCache } from './cache/result-cache.js';
import type { CacheEntry, CacheKey, ContentHash, ParamsDigest, RecognitionParams } from './cache/types.js';
import type { ImageInput, ImageLoader } from './image/image-loader.js';
import type { StructuredLogger } from './logging/structured-logger.js';
import type { ProcessorRegistry } from './processors/registry.js';
import type { ChallengeType, Processor } from './processors/types.js';

import { hashContent } from './cache/hash.js';
import { computeParamsDigest } from './cache/params-digest.js';
import { cacheError, classifyError, recognitionFailed } from './errors.js';
import { classifyAcquisitionError, SharpImageLoader } from './image/image-loader.js';
import { silentLogger } from './logging/structured-logger.js';
import { elapsedMs } from './utils.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecognitionRequest {
  image: ImageInput;
  challengeType: ChallengeType;
  params: RecognitionParams;
}

export interface RecognitionOutcome {
  result: string;
  cacheHit: boolean;
  challengeType: string;
  contentHash: ContentHash;
  paramsDigest: ParamsDigest;
  durationMs: number;
}

export interface InterceptorContext {
  readonly request: RecognitionRequest;
  readonly startedAt: number;
}

/**
 * Wraps the recognition call. Interceptors run outermost-first and must
 * call `next()` at most once.
 */
export type RecognitionInterceptor = (
  ctx: InterceptorContext,
  next: () => Promise<RecognitionOutcome>,
) => Promise<RecognitionOutcome>;

export interface DispatcherOptions {
  registry: ProcessorRegistry;
  /** Omit to disable result caching. */
  cache?: ResultCache;
  imageLoader?: ImageLoader;
  interceptors?: readonly RecognitionInterceptor[];
  /** Share one computation between concurrent identical misses. */
  dedupeInFlight?: boolean;
  logger?: StructuredLogger;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class Dispatcher {
  private readonly registry: ProcessorRegistry;
  private readonly cache?: ResultCache;
  private readonly imageLoader: ImageLoader;
  private readonly interceptors: readonly RecognitionInterceptor[];
  private readonly dedupeInFlight: boolean;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.imageLoader = options.imageLoader ?? new SharpImageLoader();
    this.interceptors = options.interceptors ?? [];
    this.dedupeInFlight = options.dedupeInFlight ?? false;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
  }

  async recognize(image: ImageInput, challengeType: ChallengeType, params: RecognitionParams = {}): Promise<string> {
    const outcome = await this.recognizeDetailed(image, challengeType, params);
    return outcome.result;
  }

  async recognizeDetailed(
    image: ImageInput,
    challengeType: ChallengeType,
    params: RecognitionParams = {},
  ): Promise<RecognitionOutcome> {
    const ctx: InterceptorContext = {
      request: { image, challengeType, params },
      startedAt: this.now(),
    };
    const chain = this.interceptors.reduceRight<() => Promise<RecognitionOutcome>>(
      (next, interceptor) => () => interceptor(ctx, next),
      () => this.run(ctx),
    );
    try {
      return await chain();
    } catch (e) {
      throw classifyError(e);
    }
  }

  /** Number of misses currently being computed under de-duplication. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private async run(ctx: InterceptorContext): Promise<RecognitionOutcome> {
    try {
      return await this.execute(ctx);
    } catch (e) {
      throw classifyError(e);
    }
  }

  private async execute(ctx: InterceptorContext): Promise<RecognitionOutcome> {
    const { image, challengeType, params } = ctx.request;
    const processor = this.registry.resolve(challengeType);

    let bytes: Buffer;
    try {
      bytes = await this.imageLoader.load(image);
    } catch (e) {
      throw classifyAcquisitionError(e, image);
    }

    const contentHash = hashContent(bytes);
    const paramsDigest = computeParamsDigest(params);
    const key: CacheKey = { contentHash, challengeType };
    const base = { challengeType, contentHash, paramsDigest };

    const cached = await this.lookup(key);
    if (cached !== undefined && cached.paramsDigest === paramsDigest) {
      return { ...base, result: cached.result, cacheHit: true, durationMs: elapsedMs(ctx.startedAt, this.now) };
    }

    const result = this.dedupeInFlight
      ? await this.computeShared(`${contentHash}:${challengeType}:${paramsDigest}`, () => this.compute(processor, bytes, base, params))
      : await this.compute(processor, bytes, base, params);

    await this.store(key, result, paramsDigest);
    return { ...base, result, cacheHit: false, durationMs: elapsedMs(ctx.startedAt, this.now) };
  }

  private async compute(
    processor: Processor,
    bytes: Buffer,
    base: { challengeType: string; contentHash: ContentHash },
    params: RecognitionParams,
  ): Promise<string> {
    const result: unknown = await processor.process(bytes, params);
    if (typeof result !== 'string' || result.trim().length === 0) {
      throw recognitionFailed('Recognition produced an empty result', {
        ...base,
        processor: processor.name,
        result: typeof result === 'string' ? result : null,
      });
    }
    return result;
  }

  private async computeShared(flightKey: string, compute: () => Promise<string>): Promise<string> {
    const existing = this.inFlight.get(flightKey);
    if (existing !== undefined) return await existing;
    const pending = compute().finally(() => {
      this.inFlight.delete(flightKey);
    });
    this.inFlight.set(flightKey, pending);
    return await pending;
  }

  private async lookup(key: CacheKey): Promise<CacheEntry | undefined> {
    if (this.cache === undefined) return undefined;
    try {
      return await this.cache.get(key);
    } catch (e) {
      this.reportCacheFault('cache lookup failed; treating as miss', key, e);
      return undefined;
    }
  }

  private async store(key: CacheKey, result: string, paramsDigest: ParamsDigest): Promise<void> {
    if (this.cache === undefined) return;
    try {
      await this.cache.put(key, result, paramsDigest);
    } catch (e) {
      this.reportCacheFault('cache store failed; result not cached', key, e);
    }
  }

  private reportCacheFault(message: string, key: CacheKey, cause: unknown): void {
    const error = cacheError(message, cause);
    this.logger.warn({
      component: 'cache',
      message,
      challengeType: key.challengeType,
      contentHash: key.contentHash,
      errorCode: error.code,
      details: error.details,
    });
  }
}

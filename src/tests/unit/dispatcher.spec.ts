import os from 'node:os';
import path from 'node:path';

import sharp from 'sharp';
import { beforeAll, describe, expect, it, vi } from 'vitest';

import type { RecognitionInterceptor } from '../../dispatcher.js';
import type { ImageLoader } from '../../image/image-loader.js';

import { hashContent } from '../../cache/hash.js';
import { computeParamsDigest } from '../../cache/params-digest.js';
import { ResultCache } from '../../cache/result-cache.js';
import { Dispatcher } from '../../dispatcher.js';
import { RecognizerError, processingTimeout } from '../../errors.js';
import { StructuredLogger } from '../../logging/structured-logger.js';
import { createDefaultRegistry } from '../../processors/registry.js';

const fakeOracle = (respond: () => Promise<string>) => ({
  classification: vi.fn((_image: Buffer) => respond()),
});

const bytesLoader: ImageLoader = {
  load: (input) => (input instanceof Uint8Array
    ? Promise.resolve(Buffer.from(input))
    : Promise.reject(new Error('bytes only'))),
};

const newCache = () => new ResultCache({ maxSize: 10, ttlMs: 60_000 });

const expectRecognizerError = async (promise: Promise<unknown>, code: number): Promise<RecognizerError> => {
  try {
    await promise;
  } catch (e) {
    expect(e).toBeInstanceOf(RecognizerError);
    if (e instanceof RecognizerError) {
      expect(e.code).toBe(code);
      return e;
    }
  }
  throw new Error(`expected error ${String(code)}`);
};

let png: Buffer;
let otherPng: Buffer;

beforeAll(async () => {
  png = await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 255, g: 0, b: 0 } } }).png().toBuffer();
  otherPng = await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 0, g: 0, b: 255 } } }).png().toBuffer();
});

describe('Dispatcher caching', () => {
  it('returns the cached result for repeated requests without calling the oracle again', async () => {
    const oracle = fakeOracle(() => Promise.resolve('Ab 12'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache: newCache(), now: () => 0 });

    const first = await dispatcher.recognizeDetailed(png, 'text');
    const second = await dispatcher.recognizeDetailed(png, 'text');

    expect(first).toEqual({
      result: 'Ab12',
      cacheHit: false,
      challengeType: 'text',
      contentHash: hashContent(png),
      paramsDigest: computeParamsDigest({}),
      durationMs: 0,
    });
    expect(second).toEqual({ ...first, cacheHit: true });
    expect(oracle.classification).toHaveBeenCalledTimes(1);
  });

  it('recomputes when params differ and keeps one entry per image and type', async () => {
    const oracle = fakeOracle(() => Promise.resolve('Ab C'));
    const cache = newCache();
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache });

    expect(await dispatcher.recognize(png, 'text')).toBe('AbC');
    expect(await dispatcher.recognize(png, 'text', { toLower: true })).toBe('abc');
    expect(await dispatcher.recognize(png, 'text', { toLower: true })).toBe('abc');
    expect(await dispatcher.recognize(png, 'text')).toBe('AbC');

    expect(oracle.classification).toHaveBeenCalledTimes(3);
    expect(cache.size).toBe(1);
  });

  it('keys entries by challenge type and content', async () => {
    const oracle = fakeOracle(() => Promise.resolve('3+5'));
    const cache = newCache();
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache });

    expect(await dispatcher.recognize(png, 'text')).toBe('3+5');
    expect(await dispatcher.recognize(png, 'calculation')).toBe('8');
    expect(await dispatcher.recognize(otherPng, 'calculation')).toBe('8');
    expect(oracle.classification).toHaveBeenCalledTimes(3);
    expect(cache.size).toBe(3);
  });

  it('calls the oracle every time without a cache', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    await dispatcher.recognize(png, 'text');
    await dispatcher.recognize(png, 'text');
    expect(oracle.classification).toHaveBeenCalledTimes(2);
  });

  it('treats a failing cache as a miss and logs it', async () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ logfmtWriter: (line) => { lines.push(line); } });
    const cache = newCache();
    vi.spyOn(cache, 'get').mockRejectedValue(new Error('lock broken'));
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache, logger });

    expect(await dispatcher.recognize(png, 'text')).toBe('AB');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('level=wrn');
    expect(lines[0]).toContain('component=cache');
    expect(lines[0]).toContain('error_code=4001');
    expect(lines[0]).toContain('message="cache lookup failed; treating as miss"');
  });
});

describe('Dispatcher failures', () => {
  it('rejects unknown challenge types before touching the image', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const load = vi.fn(bytesLoader.load);
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), imageLoader: { load } });

    const error = await expectRecognizerError(dispatcher.recognize(png, 'audio'), 3000);
    expect(error.details.knownTypes).toEqual(['text', 'calculation']);
    expect(load).not.toHaveBeenCalled();
    expect(oracle.classification).not.toHaveBeenCalled();
  });

  it('reports a blank result as recognition_failed and does not cache it', async () => {
    const oracle = fakeOracle(() => Promise.resolve('   '));
    const cache = newCache();
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache });

    await expectRecognizerError(dispatcher.recognize(png, 'text'), 3004);
    await expectRecognizerError(dispatcher.recognize(png, 'text', { removeSpaces: false }), 3004);
    expect(cache.size).toBe(0);
  });

  it('wraps unexpected oracle failures as unknown_error', async () => {
    const oracle = fakeOracle(() => Promise.reject(new Error('model exploded')));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    const error = await expectRecognizerError(dispatcher.recognize(png, 'text'), 1000);
    expect(error.details.error).toBe('model exploded');
  });

  it('passes classified oracle failures through', async () => {
    const oracle = fakeOracle(() => Promise.reject(processingTimeout(30_000)));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    await expectRecognizerError(dispatcher.recognize(png, 'text'), 3005);
  });

  it('reports a missing file as file_system_error', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    const missing = path.join(os.tmpdir(), 'captcha-ocr-missing', 'nope.png');
    const error = await expectRecognizerError(dispatcher.recognize({ kind: 'path', path: missing }, 'text'), 4003);
    expect(error.details.reason).toBe('file_not_found');
    expect(oracle.classification).not.toHaveBeenCalled();
  });

  it('reports undecodable bytes as invalid_image_data', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    const error = await expectRecognizerError(dispatcher.recognize(Buffer.from('definitely not an image'), 'text'), 3006);
    expect(error.message).toBe('Image data could not be decoded');
  });

  it('wraps unclassified loader failures as invalid_image_format', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), imageLoader: bytesLoader });
    const error = await expectRecognizerError(dispatcher.recognize({ kind: 'base64', data: 'QUI=' }, 'text'), 3001);
    expect(error.message).toBe('Invalid image');
  });

  it('reports malformed params as invalid_parameter', async () => {
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle) });
    await expectRecognizerError(dispatcher.recognize(png, 'text', { toLower: 'yes' }), 1001);
    await expectRecognizerError(dispatcher.recognize(png, 'text', { big: 1n }), 1001);
  });

  it('applies snake_case params and rejects keys no processor reads', async () => {
    const oracle = fakeOracle(() => Promise.resolve('3 + 5 = ?'));
    const cache = newCache();
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache });

    expect(await dispatcher.recognize(png, 'calculation', { return_type: 'expression' })).toBe('3+5');
    expect(await dispatcher.recognize(png, 'text', { remove_spaces: false, to_upper: true })).toBe('3 + 5 = ?');
    const error = await expectRecognizerError(dispatcher.recognize(png, 'calculation', { returns: 'expression' }), 1001);
    expect(error.details.issues).toEqual([": Unrecognized key(s) in object: 'returns'"]);
    expect(cache.size).toBe(2);
  });
});

describe('Dispatcher concurrency', () => {
  const slowOracle = () => fakeOracle(() => new Promise((resolve) => {
    setTimeout(() => { resolve('AB12'); }, 50);
  }));

  it('tolerates duplicate work for concurrent misses by default', async () => {
    const oracle = slowOracle();
    const cache = newCache();
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), cache, imageLoader: bytesLoader });
    const results = await Promise.all([dispatcher.recognize(png, 'text'), dispatcher.recognize(png, 'text')]);
    expect(results).toEqual(['AB12', 'AB12']);
    expect(oracle.classification).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(1);
  });

  it('shares one computation when in-flight de-duplication is on', async () => {
    const oracle = slowOracle();
    const dispatcher = new Dispatcher({
      registry: createDefaultRegistry(oracle),
      cache: newCache(),
      imageLoader: bytesLoader,
      dedupeInFlight: true,
    });
    const results = await Promise.all([dispatcher.recognize(png, 'text'), dispatcher.recognize(png, 'text')]);
    expect(results).toEqual(['AB12', 'AB12']);
    expect(oracle.classification).toHaveBeenCalledTimes(1);
    expect(dispatcher.inFlightCount).toBe(0);
  });
});

describe('Dispatcher interceptors', () => {
  it('runs interceptors outermost first', async () => {
    const order: string[] = [];
    const tracing = (label: string): RecognitionInterceptor => async (_ctx, next) => {
      order.push(`${label}:before`);
      const outcome = await next();
      order.push(`${label}:after`);
      return outcome;
    };
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({
      registry: createDefaultRegistry(oracle),
      interceptors: [tracing('outer'), tracing('inner')],
    });
    await dispatcher.recognize(png, 'text');
    expect(order).toEqual(['outer:before', 'inner:before', 'inner:after', 'outer:after']);
  });

  it('classifies errors thrown by interceptors', async () => {
    const failing: RecognitionInterceptor = () => Promise.reject(new Error('interceptor bug'));
    const oracle = fakeOracle(() => Promise.resolve('AB'));
    const dispatcher = new Dispatcher({ registry: createDefaultRegistry(oracle), interceptors: [failing] });
    const error = await expectRecognizerError(dispatcher.recognize(png, 'text'), 1000);
    expect(error.details.error).toBe('interceptor bug');
  });
});

import fs from 'node:fs/promises';

import sharp from 'sharp';

import {
  classifyError,
  describeError,
  imageTooLarge,
  imageTooSmall,
  invalidImage,
  invalidImageData,
  isRecognizerError,
  type RecognizerError,
} from '../errors.js';

export type ImageSource =
  | { kind: 'path'; path: string }
  | { kind: 'base64'; data: string }
  | { kind: 'decoded'; image: sharp.Sharp };

/** Raw bytes, or a source the loader turns into bytes. */
export type ImageInput = Uint8Array | ImageSource;

export interface ImageLoader {
  load: (input: ImageInput) => Promise<Buffer>;
}

export interface ImageLoaderOptions {
  maxBytes?: number;
  minBytes?: number;
  /** sharp format ids; `jpg` is accepted as an alias of `jpeg`. */
  supportedFormats?: readonly string[];
  /** Decode the header with sharp before handing bytes to the core. */
  validate?: boolean;
}

export const DEFAULT_MAX_IMAGE_BYTES = 16 * 1024 * 1024;
export const DEFAULT_SUPPORTED_FORMATS: readonly string[] = ['png', 'jpeg', 'gif', 'webp', 'tiff'];

const DATA_URL_PREFIX = /^data:[^,]*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/_-]*={0,2}$/;

const normalizeFormat = (format: string): string => {
  const lowered = format.trim().toLowerCase();
  return lowered === 'jpg' ? 'jpeg' : lowered;
};

export const decodeBase64Image = (encoded: string): Buffer => {
  const body = encoded.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (body.length === 0 || !BASE64_BODY.test(body)) {
    throw invalidImageData('Invalid base64 image payload', { length: encoded.length });
  }
  // Node's base64 decoder also accepts the url-safe alphabet.
  return Buffer.from(body, 'base64');
};

export const describeImageInput = (input: ImageInput): Record<string, unknown> => {
  if (input instanceof Uint8Array) return { source: 'bytes', bytes: input.byteLength };
  if (input.kind === 'path') return { source: 'path', path: input.path };
  if (input.kind === 'base64') return { source: 'base64', length: input.data.length };
  return { source: 'decoded' };
};

/**
 * Default image source: acquires bytes from any {@link ImageInput}, enforces
 * size limits and, when enabled, checks that sharp can decode the payload in
 * one of the supported formats.
 */
export class SharpImageLoader implements ImageLoader {
  private readonly maxBytes: number;
  private readonly minBytes: number;
  private readonly supportedFormats: Set<string>;
  private readonly validate: boolean;

  constructor(options: ImageLoaderOptions = {}) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_IMAGE_BYTES;
    this.minBytes = Math.max(1, options.minBytes ?? 1);
    this.supportedFormats = new Set((options.supportedFormats ?? DEFAULT_SUPPORTED_FORMATS).map(normalizeFormat));
    this.validate = options.validate ?? true;
  }

  async load(input: ImageInput): Promise<Buffer> {
    const bytes = await this.acquire(input);
    if (bytes.byteLength === 0) {
      throw invalidImageData('Image payload is empty', describeImageInput(input));
    }
    if (bytes.byteLength > this.maxBytes) throw imageTooLarge(bytes.byteLength, this.maxBytes);
    if (bytes.byteLength < this.minBytes) throw imageTooSmall(bytes.byteLength, this.minBytes);
    if (this.validate) await this.checkDecodable(bytes);
    return bytes;
  }

  private async acquire(input: ImageInput): Promise<Buffer> {
    if (input instanceof Uint8Array) {
      return Buffer.isBuffer(input) ? input : Buffer.from(input);
    }
    switch (input.kind) {
      case 'path':
        // errno failures surface as file_system_error
        try {
          return await fs.readFile(input.path);
        } catch (e) {
          throw classifyError(e);
        }
      case 'base64':
        return decodeBase64Image(input.data);
      case 'decoded':
        try {
          return await input.image.toBuffer();
        } catch (e) {
          throw invalidImageData('Decoded image could not be serialized', { error: describeError(e) }, e);
        }
    }
  }

  private async checkDecodable(bytes: Buffer): Promise<void> {
    let format: string | undefined;
    try {
      const metadata = await sharp(bytes).metadata();
      format = metadata.format;
    } catch (e) {
      throw invalidImageData('Image data could not be decoded', { error: describeError(e) }, e);
    }
    if (format === undefined || !this.supportedFormats.has(normalizeFormat(format))) {
      throw invalidImage(`Unsupported image format: ${format ?? 'unknown'}`, {
        format: format ?? null,
        supportedFormats: [...this.supportedFormats],
      });
    }
  }
}

/** Wraps any acquisition failure that is not already classified as InvalidImage. */
export const classifyAcquisitionError = (error: unknown, input: ImageInput): RecognizerError => {
  if (isRecognizerError(error)) return error;
  const classified = classifyError(error);
  if (classified.kind !== 'unknown_error') return classified;
  return invalidImage('Invalid image', { ...describeImageInput(input), error: describeError(error) }, error);
};

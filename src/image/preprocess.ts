import sharp from 'sharp';

import { describeError, invalidImageData, invalidParameter } from '../errors.js';

export type DenoiseMethod = 'median' | 'gaussian';

export interface PreprocessOptions {
  grayscale?: boolean;
  /** Contrast factor around mid-grey; 1 leaves the image unchanged. */
  contrast?: number;
  /** Sharpening factor; values <= 1 skip sharpening. */
  sharpness?: number;
  denoise?: DenoiseMethod;
  /** Binarization cut-off in 0..255. */
  threshold?: number;
}

export const DEFAULT_PREPROCESS_OPTIONS: Required<Omit<PreprocessOptions, 'threshold'>> = {
  grayscale: true,
  contrast: 2,
  sharpness: 1.5,
  denoise: 'median',
};

const MEDIAN_WINDOW = 3;
const GAUSSIAN_SIGMA = 1;
const MAX_SHARPEN_SIGMA = 10;

const validateOptions = (options: PreprocessOptions): void => {
  if (options.contrast !== undefined && (!Number.isFinite(options.contrast) || options.contrast < 0)) {
    throw invalidParameter('contrast must be a non-negative number', { contrast: options.contrast });
  }
  if (options.sharpness !== undefined && (!Number.isFinite(options.sharpness) || options.sharpness < 0)) {
    throw invalidParameter('sharpness must be a non-negative number', { sharpness: options.sharpness });
  }
  if (options.threshold !== undefined && (!Number.isInteger(options.threshold) || options.threshold < 0 || options.threshold > 255)) {
    throw invalidParameter('threshold must be an integer in 0..255', { threshold: options.threshold });
  }
};

/**
 * Optional enhancement pass run by callers before recognition:
 * grayscale, contrast, sharpen, denoise, threshold, in that order.
 * Always returns PNG bytes.
 */
export async function preprocessImage(input: Uint8Array, options: PreprocessOptions = {}): Promise<Buffer> {
  validateOptions(options);
  let pipeline = sharp(input);
  if (options.grayscale === true) pipeline = pipeline.grayscale();
  if (options.contrast !== undefined && options.contrast !== 1) {
    // out = f * in + 128 * (1 - f)
    pipeline = pipeline.linear(options.contrast, 128 * (1 - options.contrast));
  }
  if (options.sharpness !== undefined && options.sharpness > 1) {
    pipeline = pipeline.sharpen({ sigma: Math.min(MAX_SHARPEN_SIGMA, options.sharpness - 0.5) });
  }
  if (options.denoise === 'median') pipeline = pipeline.median(MEDIAN_WINDOW);
  if (options.denoise === 'gaussian') pipeline = pipeline.blur(GAUSSIAN_SIGMA);
  if (options.threshold !== undefined) pipeline = pipeline.threshold(options.threshold);
  try {
    return await pipeline.png().toBuffer();
  } catch (e) {
    throw invalidImageData('Image could not be preprocessed', { error: describeError(e) }, e);
  }
}

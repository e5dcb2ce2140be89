import type { RecognitionParams } from '../cache/types.js';

/**
 * The external image-to-text classifier. Implementations own model
 * inference, resizing and timeouts; the core treats them as opaque.
 */
export interface OcrOracle {
  classification: (image: Buffer) => Promise<string>;
}

export type BuiltinChallengeType = 'text' | 'calculation';

// Open enum: built-ins autocomplete, any registered tag is accepted.
export type ChallengeType = BuiltinChallengeType | (string & {});

/** Interprets one image for a challenge type. Extension point for new types. */
export interface Processor {
  readonly name: string;
  process: (image: Buffer, params: RecognitionParams) => Promise<string>;
}

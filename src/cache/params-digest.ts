import type { ParamsDigest, RecognitionParams } from './types.js';

import { describeError, invalidParameter } from '../errors.js';

import { sha256Hex } from './hash.js';
import { stableStringify } from './stable-stringify.js';

export const canonicalizeParams = (params: RecognitionParams): string => {
  try {
    return stableStringify(params);
  } catch (e) {
    throw invalidParameter('Recognition parameters must be JSON-serializable', { error: describeError(e) }, e);
  }
};

export const computeParamsDigest = (params: RecognitionParams): ParamsDigest =>
  sha256Hex(canonicalizeParams(params));

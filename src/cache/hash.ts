import crypto from 'node:crypto';

import type { ContentHash } from './types.js';

export const sha256Hex = (input: string | Uint8Array): string =>
  crypto.createHash('sha256').update(input).digest('hex');

export const hashContent = (bytes: Uint8Array): ContentHash => sha256Hex(bytes);

import { z } from 'zod';

import type { RecognitionParams } from '../cache/types.js';
import type { OcrOracle, Processor } from './types.js';

import { preferParam } from './param-aliases.js';

export interface TextOptions {
  removeSpaces?: boolean;
  toLower?: boolean;
  toUpper?: boolean;
}

const TextParamsSchema = z
  .object({
    remove_spaces: z.boolean().optional(),
    removeSpaces: z.boolean().optional(),
    to_lower: z.boolean().optional(),
    toLower: z.boolean().optional(),
    to_upper: z.boolean().optional(),
    toUpper: z.boolean().optional(),
  })
  .strict()
  .transform((raw, ctx): TextOptions => ({
    removeSpaces: preferParam(ctx, 'remove_spaces', raw.remove_spaces, 'removeSpaces', raw.removeSpaces),
    toLower: preferParam(ctx, 'to_lower', raw.to_lower, 'toLower', raw.toLower),
    toUpper: preferParam(ctx, 'to_upper', raw.to_upper, 'toUpper', raw.toUpper),
  }));

/** Accepts `remove_spaces`, `to_lower`, `to_upper` or their camelCase forms. */
export const parseTextParams = (params: RecognitionParams): TextOptions => TextParamsSchema.parse(params);

/**
 * Post-processing order is fixed: strip spaces, lowercase, uppercase.
 * With both case flags set the uppercase pass runs last and wins.
 */
export const postProcessText = (text: string, options: TextOptions): string => {
  let out = text;
  if (options.removeSpaces ?? true) out = out.replaceAll(' ', '');
  if (options.toLower ?? false) out = out.toLowerCase();
  if (options.toUpper ?? false) out = out.toUpperCase();
  return out;
};

export class TextProcessor implements Processor {
  readonly name = 'text';

  constructor(private readonly oracle: OcrOracle) {}

  async process(image: Buffer, params: RecognitionParams): Promise<string> {
    const options = parseTextParams(params);
    const raw = await this.oracle.classification(image);
    return postProcessText(raw, options);
  }
}

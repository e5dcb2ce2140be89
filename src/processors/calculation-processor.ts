import { z } from 'zod';

import type { RecognitionParams } from '../cache/types.js';
import type { OcrOracle, Processor } from './types.js';

import { preferParam } from './param-aliases.js';

export type CalculationOperator = '+' | '-' | '*' | 'x' | '×' | '/' | '÷';

export interface ParsedExpression {
  operandA: bigint;
  operator: CalculationOperator;
  operandB: bigint;
  /** The matched substring, exactly as it appeared in the cleaned text. */
  source: string;
}

export type CalculationValue =
  | { kind: 'integer'; value: bigint; quotient: boolean }
  | { kind: 'decimal'; text: string }
  | { kind: 'infinity' };

export interface CalculationOptions {
  returnType?: 'result' | 'expression';
  asInt?: boolean;
}

const ReturnTypeSchema = z.enum(['result', 'expression']);

const CalculationParamsSchema = z
  .object({
    return_type: ReturnTypeSchema.optional(),
    returnType: ReturnTypeSchema.optional(),
    as_int: z.boolean().optional(),
    asInt: z.boolean().optional(),
  })
  .strict()
  .transform((raw, ctx): CalculationOptions => ({
    returnType: preferParam(ctx, 'return_type', raw.return_type, 'returnType', raw.returnType),
    asInt: preferParam(ctx, 'as_int', raw.as_int, 'asInt', raw.asInt),
  }));

/** Accepts `return_type`, `as_int` or their camelCase forms. */
export const parseCalculationParams = (params: RecognitionParams): CalculationOptions =>
  CalculationParamsSchema.parse(params);

/** Printed for division by zero. */
export const INFINITY_SENTINEL = 'Infinity';

// Fractional digits kept for quotients that do not divide exactly.
const FRACTION_DIGITS = 16;

// Characters the oracle commonly confuses with digits.
const CONFUSIONS: readonly (readonly [string, string])[] = [
  ['O', '0'],
  ['o', '0'],
  ['l', '1'],
  ['I', '1'],
  ['S', '5'],
  ['Z', '2'],
  ['B', '8'],
];

const EXPRESSION_PATTERN = /(\p{Nd}+)([+\-*/x×÷])(\p{Nd}+)/u;
const DECIMAL_DIGIT = /^\p{Nd}$/u;

const integer = (value: bigint): CalculationValue => ({ kind: 'integer', value, quotient: false });

const divideToDecimal = (a: bigint, b: bigint): string => {
  let remainder = a % b;
  let fraction = '';
  while (remainder !== 0n && fraction.length < FRACTION_DIGITS) {
    remainder *= 10n;
    fraction += (remainder / b).toString();
    remainder %= b;
  }
  const trimmed = fraction.replace(/0+$/, '');
  return `${(a / b).toString()}.${trimmed === '' ? '0' : trimmed}`;
};

const divide = (a: bigint, b: bigint): CalculationValue => {
  if (b === 0n) return { kind: 'infinity' };
  if (a % b === 0n) return { kind: 'integer', value: a / b, quotient: true };
  return { kind: 'decimal', text: divideToDecimal(a, b) };
};

const OPERATORS: Record<CalculationOperator, (a: bigint, b: bigint) => CalculationValue> = {
  '+': (a, b) => integer(a + b),
  '-': (a, b) => integer(a - b),
  '*': (a, b) => integer(a * b),
  'x': (a, b) => integer(a * b),
  '×': (a, b) => integer(a * b),
  '/': divide,
  '÷': divide,
};

const isOperator = (value: string): value is CalculationOperator =>
  Object.prototype.hasOwnProperty.call(OPERATORS, value);

// Unicode lays out every Nd run as consecutive 0..9 blocks.
const digitValue = (digit: string): number => {
  const codePoint = digit.codePointAt(0) ?? 0;
  let start = codePoint;
  while (start > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) start -= 1;
  return (codePoint - start) % 10;
};

const parseDigits = (digits: string): bigint =>
  BigInt(Array.from(digits, (digit) => digitValue(digit).toString()).join(''));

export const normalizeCalculationText = (raw: string): string => {
  const withoutSpaces = raw.replaceAll(' ', '');
  const corrected = CONFUSIONS.reduce((text, [from, to]) => text.replaceAll(from, to), withoutSpaces);
  return corrected.replaceAll('?', '').replaceAll('=', '');
};

/** First `digits operator digits` run, or undefined. Surrounding text is ignored. */
export const parseExpression = (text: string): ParsedExpression | undefined => {
  const match = EXPRESSION_PATTERN.exec(text);
  if (match === null) return undefined;
  const [source, left, operator, right] = match;
  if (!isOperator(operator)) return undefined;
  return {
    operandA: parseDigits(left),
    operator,
    operandB: parseDigits(right),
    source,
  };
};

export const evaluateExpression = (expression: ParsedExpression): CalculationValue =>
  OPERATORS[expression.operator](expression.operandA, expression.operandB);

export const formatCalculationValue = (value: CalculationValue, asInt: boolean): string => {
  switch (value.kind) {
    case 'infinity':
      return INFINITY_SENTINEL;
    case 'decimal':
      return value.text;
    case 'integer':
      // Only quotients are fractional values; sums, differences and products stay integers.
      return value.quotient && !asInt ? `${value.value.toString()}.0` : value.value.toString();
  }
};

export class CalculationProcessor implements Processor {
  readonly name = 'calculation';

  constructor(private readonly oracle: OcrOracle) {}

  async process(image: Buffer, params: RecognitionParams): Promise<string> {
    const options = parseCalculationParams(params);
    const raw = await this.oracle.classification(image);
    return interpretCalculation(raw, options);
  }
}

export const interpretCalculation = (raw: string, options: CalculationOptions = {}): string => {
  const cleaned = normalizeCalculationText(raw);
  const expression = parseExpression(cleaned);
  if (expression === undefined) return cleaned;
  if ((options.returnType ?? 'result') === 'expression') return expression.source;
  return formatCalculationValue(evaluateExpression(expression), options.asInt ?? true);
};

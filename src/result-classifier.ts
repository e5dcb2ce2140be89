export type ResultClass =
  | 'pure_digit'
  | 'pure_letter'
  | 'mixed_alphanumeric'
  | 'calculation'
  | 'special_symbol'
  | 'unknown';

const DIGIT = /\p{Nd}/u;
const LETTER = /\p{L}/u;
const ALL_DIGITS = /^\p{Nd}+$/u;
const ALL_LETTERS = /^\p{L}+$/u;
const CALCULATION_OPERATORS = ['+', '-', '×', '÷', '*', '/', '='] as const;

const isAlphanumeric = (ch: string): boolean => DIGIT.test(ch) || LETTER.test(ch);

/** Buckets a recognized string by its character makeup. Spaces are ignored. */
export function classifyResult(text: string): ResultClass {
  const clean = text.replaceAll(' ', '');
  if (clean.length === 0) return 'unknown';
  if (ALL_DIGITS.test(clean)) return 'pure_digit';
  if (ALL_LETTERS.test(clean)) return 'pure_letter';
  if (DIGIT.test(clean) && LETTER.test(clean)) return 'mixed_alphanumeric';
  if (Array.from(clean).some((ch) => !isAlphanumeric(ch))) {
    return CALCULATION_OPERATORS.some((op) => clean.includes(op)) ? 'calculation' : 'special_symbol';
  }
  return 'unknown';
}

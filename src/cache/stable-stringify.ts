import { isPlainObject } from '../utils.js';

// Code-unit ordering: localeCompare depends on the runtime's ICU data.
const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort(compareKeys)
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

/**
 * Serializes a value with object keys sorted at every depth.
 * Throws on cycles and bigint, like JSON.stringify.
 */
export const stableStringify = (value: unknown): string => {
  const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
  const serialized = JSON.stringify(value, replacer);
  // JSON.stringify yields undefined for a bare undefined/function value.
  return typeof serialized === 'string' ? serialized : 'null';
};

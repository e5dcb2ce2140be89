export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value) && !ArrayBuffer.isView(value)
);

export const truncateTail = (text: string, maxLength: number): string => (
  text.length <= maxLength ? text : `…${text.slice(text.length - maxLength)}`
);

export const elapsedMs = (startedAt: number, now: () => number = Date.now): number => Math.max(0, now() - startedAt);

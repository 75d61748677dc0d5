export const getErrorMessage = (err: unknown): string => err instanceof Error ? err.message : String(err);

export const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

export const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

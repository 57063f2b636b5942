import { ApiError } from '../middlewares/errorHandler';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads a string field from a parsed body; anything that is not a string reads as ''. */
export const readString = (body: unknown, field: string): string => {
  if (!isRecord(body)) return '';
  const value = body[field];
  return typeof value === 'string' ? value : '';
};

/** Accepts either a JSON array of strings or a comma-separated form value. */
export const readStringList = (body: unknown, field: string): string[] => {
  if (!isRecord(body)) return [];
  const value = body[field];
  const items = Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : typeof value === 'string'
      ? value.split(',')
      : [];
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
};

export const readInteger = (
  body: unknown,
  field: string,
  options: { fallback: number; min: number; max: number }
): number => {
  if (!isRecord(body)) return options.fallback;
  const raw = body[field];
  if (raw === undefined || raw === null || raw === '') return options.fallback;

  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw.trim()) : NaN;
  if (!Number.isInteger(value) || value < options.min || value > options.max) {
    throw new ApiError(400, `${field} must be a whole number between ${options.min} and ${options.max}`);
  }
  return value;
};

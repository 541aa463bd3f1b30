import { ApiError } from './errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @throws ApiError (400) when the body is not a JSON object
 */
export function getBodyRecord(data: unknown): Record<string, unknown> {
  if (!isRecord(data)) {
    throw new ApiError('Request body must be a JSON object', 400);
  }
  return data;
}

export function optionalText(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * @throws ApiError (400) when the value is missing or blank
 */
export function requireText(body: Record<string, unknown>, key: string): string {
  const value = optionalText(body, key);
  if (value === null) {
    throw new ApiError(`${key} is required`, 400);
  }
  return value;
}

/**
 * Reads a number, also accepting numeric text such as `"12.5"`.
 * @returns null when the value is absent
 * @throws ApiError (400) when the value is present but not a finite number
 */
export function optionalNumber(body: Record<string, unknown>, key: string): number | null {
  const value = body[key];
  if (value === undefined || value === null || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new ApiError(`${key} must be a number`, 400);
  }
  return parsed;
}

export function requireNumber(body: Record<string, unknown>, key: string): number {
  const value = optionalNumber(body, key);
  if (value === null) {
    throw new ApiError(`${key} is required`, 400);
  }
  return value;
}

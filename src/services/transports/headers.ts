import type { HeaderMap } from '../../config/types.js';

import { ValidationError } from '../../errors/app-error.js';

function assertHeaderValid(scratch: Headers, key: string, value: string): void {
  try {
    scratch.set(key, value);
  } catch (error) {
    throw new ValidationError(`Invalid header: ${key}`, {
      header: key,
      reason: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Checks every header name and value, keeping the caller's spelling.
 */
export function validateRequestHeaders(headers: HeaderMap): HeaderMap {
  const scratch = new Headers();
  for (const [key, value] of Object.entries(headers)) {
    assertHeaderValid(scratch, key, value);
  }
  return { ...headers };
}

export function withoutHeaders(
  headers: HeaderMap,
  names: Iterable<string>
): HeaderMap {
  const blocked = new Set([...names].map((name) => name.toLowerCase()));
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => !blocked.has(key.toLowerCase()))
  );
}

/**
 * Later maps win; names compare case-insensitively.
 */
export function mergeHeaders(...maps: (HeaderMap | undefined)[]): HeaderMap {
  let merged: HeaderMap = {};
  for (const map of maps) {
    if (!map) continue;
    merged = { ...withoutHeaders(merged, Object.keys(map)), ...map };
  }
  return merged;
}

function stringifyHeaderValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value.filter(
      (part): part is string => typeof part === 'string'
    );
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return undefined;
}

export function normalizeResponseHeaders(raw: object): HeaderMap {
  const entries: [string, unknown][] = Object.entries(raw);
  const headers: HeaderMap = {};
  for (const [key, value] of entries) {
    const normalized = stringifyHeaderValue(value);
    if (normalized !== undefined) headers[key.toLowerCase()] = normalized;
  }
  return headers;
}

import type { QueryParams, QueryValue } from '../task/types.js';

export const isValidUrl = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};

/**
 * Booleans render as `True` / `False`, the literal the downstream services
 * parse as a boolean flag.
 */
export const formatQueryValue = (value: Exclude<QueryValue, undefined>): string => {
  if (value === null) {
    return '';
  }

  if (typeof value === 'boolean') {
    return value ? 'True' : 'False';
  }

  return String(value);
};

/**
 * Merges `query` into the query string of `url`. Keys already present are
 * replaced (last wins); `undefined` values are skipped; arrays become
 * repeated keys.
 */
export const mergeQuery = (url: string, query: QueryParams): string => {
  const target = new URL(url);

  for (const [key, rawValue] of Object.entries(query)) {
    if (rawValue === undefined) {
      continue;
    }

    target.searchParams.delete(key);

    const values: readonly QueryValue[] = isQueryList(rawValue)
      ? rawValue
      : [rawValue];

    for (const value of values) {
      if (value !== undefined) {
        target.searchParams.append(key, formatQueryValue(value));
      }
    }
  }

  return target.toString();
};

function isQueryList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value);
}

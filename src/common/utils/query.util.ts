import type { QueryParams } from '../../modules/transport/interfaces/transport.interface.js';

/**
 * Serialize query parameters. Nullish values are dropped, arrays repeat the key
 * and dates are sent as RFC 3339 timestamps in UTC without fractional seconds.
 */
export function buildQueryString(query: QueryParams = {}): string {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        search.append(key, String(item));
      }
    } else if (value instanceof Date) {
      search.append(key, formatTimestamp(value));
    } else {
      search.append(key, String(value));
    }
  }

  return search.toString();
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

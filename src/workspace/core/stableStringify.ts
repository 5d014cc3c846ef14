import type { JsonValue } from '../types';

/**
 * JSON serialization with object keys in sorted order, so equal values always
 * produce equal text (and equal digests).
 */
export const stableStringify = (value: JsonValue): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys
      .map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`)
      .join(',')}}`;
  }
  return JSON.stringify(value);
};

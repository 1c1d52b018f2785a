import crypto from 'crypto';
import type { UnsignedSessionRecord } from './types.js';

/**
 * Canonical JSON: object keys sorted recursively, array order kept,
 * undefined members dropped.
 */
export function canonicalStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null';

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalStringify(item)).join(',')}]`;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalStringify(member)}`);
    return `{${entries.join(',')}}`;
  }

  return 'null';
}

export function computeRecordChecksum(record: UnsignedSessionRecord): string {
  return crypto
    .createHash('sha256')
    .update(canonicalStringify(record), 'utf8')
    .digest('hex');
}

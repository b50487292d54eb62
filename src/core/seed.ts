/**
 * Content hashing for scan records and scan identifiers
 */

import { createHash, randomUUID } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  return deterministicHash(stableStringify(content));
}

/** Random 8-hex suffix for scan identifiers. */
export function shortUuid(): string {
  return randomUUID().replace(/-/g, '').substring(0, 8);
}

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([key, v]) => JSON.stringify(key) + ':' + stableStringify(v)).join(',') + '}';
}

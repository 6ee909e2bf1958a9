import { createHash } from 'node:crypto';

export const KEY_DELIMITER = '|';

function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => (item === undefined ? null : sortValue(item)));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member === undefined || typeof member === 'function') continue;
      out[key] = sortValue(member);
    }
    return out;
  }
  return value;
}

/**
 * Stable string form of a pipeline input. Raw strings pass through untouched;
 * anything else is JSON with object keys sorted at every depth.
 */
export function canonicalize(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(sortValue(value)) ?? 'null';
}

/**
 * Key for inputs that span several entities. The stage suffix keeps the same
 * entities from sharing a key across stages.
 */
export function composeKey(parts: readonly unknown[], stage: string): string {
  return [...parts.map(canonicalize), stage].join(KEY_DELIMITER);
}

/** Fixed-length (64 hex chars) digest of a canonical string. */
export function digest(canonical: string): string {
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

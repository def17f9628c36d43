import * as crypto from 'crypto';

/**
 * Canonical JSON for hashing ledger snapshots.
 *
 * Object keys are sorted recursively, bigint becomes its decimal string, a Map
 * becomes an array of [key, value] pairs sorted by key, and undefined object
 * members are dropped. Two equal states always produce the same string.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(toCanonical(value));
}

function toCanonical(value: unknown): unknown {
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return value;
  }

  if (value === null) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map(toCanonical);
  }
  if (value instanceof Map) {
    return [...value.entries()]
      .map(([k, v]): [string, unknown] => [String(k), toCanonical(v)])
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  const out: Record<string, unknown> = {};
  for (const [key, member] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : 1))) {
    if (member !== undefined) {
      out[key] = toCanonical(member);
    }
  }
  return out;
}

export function computeHash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

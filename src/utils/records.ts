import type { RawRecord } from '../interfaces';

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the object items of a backend list payload.
 */
export function recordsOf(value: unknown): RawRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Recursively merge source into target. Plain objects merge key by key;
 * everything else (arrays included) replaces.
 */
export function deepMerge(target: RawRecord, source: RawRecord): RawRecord {
  for (const [key, value] of Object.entries(source)) {
    const existing = target[key];
    if (isRecord(value) && isRecord(existing)) {
      deepMerge(existing, value);
    } else if (isRecord(value)) {
      target[key] = deepMerge({}, value);
    } else {
      target[key] = value;
    }
  }
  return target;
}

/**
 * Set a value at a dotted path, creating intermediate objects.
 */
export function setPath(target: RawRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawRecord = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

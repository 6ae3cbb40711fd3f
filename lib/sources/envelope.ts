// Response bodies come in a handful of shapes: `{ x: { items: [] } }` for
// Property Manager, `{ x: [] }` for most products, `{ items: [] }` or a bare
// array for traffic management. These helpers turn them into plain arrays.

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow `keys` into `body` and return the array found there, or [].
 * `listAt(body, 'properties', 'items')` reads `body.properties.items`.
 */
export function listAt(body: unknown, ...keys: string[]): unknown[] {
  let current: unknown = body;
  for (const key of keys) {
    if (!isRecord(current)) return [];
    current = current[key];
  }
  return Array.isArray(current) ? current : [];
}

/**
 * Normalise a list endpoint body: prefer an `items` key, else the body itself
 * when it is an array, else nothing.
 */
export function normalizeItems(body: unknown): unknown[] {
  if (isRecord(body) && 'items' in body) return listAt(body, 'items');
  if (Array.isArray(body)) return body;
  return [];
}

export function recordsOf(values: unknown[]): JsonObject[] {
  return values.filter(isRecord);
}

/** First non-empty string among `keys`. */
export function stringField(obj: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'string' && v) return v;
  }
  return undefined;
}

/** First usable identifier among `keys`; numeric ids are kept as numbers. */
export function idField(obj: JsonObject, ...keys: string[]): string | number | undefined {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'string' && v) return v;
    if (typeof v === 'number' && Number.isFinite(v)) return v;
  }
  return undefined;
}

/** First positive integer among `keys`, accepting numeric strings. */
export function versionField(obj: JsonObject, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = obj[key];
    const n = typeof v === 'string' ? Number(v) : v;
    if (typeof n === 'number' && Number.isInteger(n) && n > 0) return n;
  }
  return undefined;
}

export function recordField(obj: JsonObject, key: string): JsonObject {
  const v = obj[key];
  return isRecord(v) ? v : {};
}

export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

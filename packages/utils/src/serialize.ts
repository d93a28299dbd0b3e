/**
 * JSON-safe copy of a value: bigints become decimal strings, nested
 * arrays and plain objects are converted recursively.
 */
export type JsonSafe<T> = T extends bigint
  ? string
  : T extends Array<infer U>
    ? JsonSafe<U>[]
    : T extends object
      ? { [K in keyof T]: JsonSafe<T[K]> }
      : T;

export function toJsonSafe<T>(value: T): JsonSafe<T>;
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonSafe(item));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonSafe(item);
    }
    return out;
  }
  return value;
}

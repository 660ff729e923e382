/**
 * Deep freeze a value and everything reachable from it.
 *
 * Binary views (Buffer, Uint8Array) are left as they are: freezing a typed
 * array with elements throws.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  if (ArrayBuffer.isView(value)) {
    return value;
  }

  for (const key of Reflect.ownKeys(value)) {
    deepFreeze<unknown>(Reflect.get(value, key));
  }

  Object.freeze(value);
  return value;
}

/**
 * Deep freeze an object and all nested objects.
 * Any later attempt to mutate the result throws a TypeError in strict mode.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  // Freeze nested objects first (depth-first)
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

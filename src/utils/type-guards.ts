/**
 * This is a generic type guard for checking if an object has a property.
 *
 * @param obj The object to check
 * @param key The property to check for
 * @returns True if the object has the property, false otherwise
 */
export function hasProperty<T extends object, K extends PropertyKey>(
  obj: T,
  key: K
): obj is T & Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Type guard for plain JSON objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

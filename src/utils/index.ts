/**
 * Helpers for building option maps from resolved settings.
 */

/**
 * Returns a copy of `map` with `key` set to `value` when the value is present
 * (neither `null` nor `undefined`). The input map is left untouched.
 */
export function setIfExists<V>(
  map: Readonly<Record<string, V>>,
  key: string,
  value: V | null | undefined,
): Record<string, V> {
  if (value === null || value === undefined) return { ...map };
  return { ...map, [key]: value };
}

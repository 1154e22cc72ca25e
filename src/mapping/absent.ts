/**
 * Marker for "no value". Distinct from every coerced value, including
 * 0, false and the empty string.
 */
export const ABSENT: unique symbol = Symbol('absent');

export type Absent = typeof ABSENT;

export function isAbsent(value: unknown): value is Absent {
  return value === ABSENT;
}

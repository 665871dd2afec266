export function isEmptyObject(value: unknown): boolean {
  return value != null && typeof value === "object" && Object.keys(value).length === 0;
}

export function mapValues<T, R>(obj: {[key: string]: T}, iteratee: (value: T, key: string) => R): {[key: string]: R} {
  const output: {[key: string]: R} = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = iteratee(value, key);
  }
  return output;
}

/**
 * Object created by a literal, `Object.create(null)` or a parser, not a class instance nor an array
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * True when `current` already carries every value in `patch`. Arrays must
 * match element by element; nested objects only on the keys the patch names,
 * so fields the repository derives (line totals) are not compared.
 */
export function carriesPatch(current: object, patch: object): boolean {
  return matches(patch, current);
}

function matches(expected: unknown, actual: unknown): boolean {
  if (expected === undefined) {
    return true;
  }
  if (expected instanceof Date) {
    return actual instanceof Date && actual.getTime() === expected.getTime();
  }
  if (Array.isArray(expected)) {
    return (
      Array.isArray(actual) &&
      actual.length === expected.length &&
      expected.every((item, index) => matches(item, actual[index]))
    );
  }
  if (typeof expected === 'object' && expected !== null) {
    if (typeof actual !== 'object' || actual === null) {
      return false;
    }
    const fields = new Map(Object.entries(actual));
    return Object.entries(expected).every(([key, value]) =>
      matches(value, fields.get(key)),
    );
  }
  return Object.is(expected, actual);
}

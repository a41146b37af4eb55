/**
 * Exhaustiveness helper for discriminated unions (`kind`, `code`, `_tag`).
 * Adding a union member without handling it becomes a compile error at every `switch`.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))}`);
}

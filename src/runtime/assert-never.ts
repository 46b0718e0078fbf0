/**
 * Exhaustiveness helper for discriminated unions.
 * Use in `switch` statements so adding a new error kind or lock mode fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}

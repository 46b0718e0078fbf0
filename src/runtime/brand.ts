/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary (configuration parsing).
 *
 * NOTE: Use a string-keyed marker instead of a `unique symbol` so zod schemas that
 * transform into branded types can be exported without TS4023 errors.
 *
 * Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

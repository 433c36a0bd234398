/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it went through a parser at a boundary
 * (dataset ids, configured roots). Brands are erased at runtime.
 *
 * NOTE: string-keyed marker rather than a `unique symbol` so that zod schemas
 * transforming into branded types can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

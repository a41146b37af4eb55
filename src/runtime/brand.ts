/**
 * Nominal typing for values that crossed a parsing boundary.
 *
 * A string-keyed marker is used rather than a `unique symbol` so that zod
 * schemas transforming into branded types can be exported without TS4023.
 * Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

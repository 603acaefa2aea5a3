/**
 * Nominal typing for values that passed a boundary check: a `TempRoot` came
 * out of config parsing, a `ContentHash` came out of the hasher.
 *
 * String-keyed marker rather than a `unique symbol`, so zod transforms into a
 * branded type can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

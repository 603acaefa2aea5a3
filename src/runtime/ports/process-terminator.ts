/**
 * How the process should end once a command has printed its result.
 */
export type Termination =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' };

/**
 * Ends the process. Only entrypoints hold one; commands return data instead.
 */
export interface ProcessTerminator {
  terminate(termination: Termination): never;
}

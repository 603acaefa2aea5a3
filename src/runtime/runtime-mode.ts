/**
 * Runtime mode of the current process.
 * Injected through the container, never inferred inside services.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'test' };

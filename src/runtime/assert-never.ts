/**
 * Exhaustiveness helper for discriminated unions (error tags, driver states, exit codes).
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}

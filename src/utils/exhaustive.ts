/** Compile-time exhaustiveness check for switches over outcome unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

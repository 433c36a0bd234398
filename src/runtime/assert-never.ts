/**
 * Exhaustiveness helper for closed unions (storage classes, version requests, error tags).
 * Put it in the `default` branch so adding a union member fails at compile time.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}

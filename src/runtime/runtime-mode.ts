/**
 * Runtime mode of the current process.
 * Injected at the composition root instead of being sniffed from env vars in services.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };

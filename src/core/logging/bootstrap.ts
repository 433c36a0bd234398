import { createRootLogger } from './create-logger.js';
import type { Logger } from './types.js';

// For code that runs before the container exists (config loading, CLI startup).
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  _bootstrapLogger ??= createRootLogger();
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component, phase: 'bootstrap' });
}

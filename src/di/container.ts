import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { loadSiteConfig } from '../config/site-config.js';
import type { ValidatedSiteConfig } from '../config/site-config.js';
import type { AppError } from '../errors/app-error.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import { LocalDirectoryListing } from '../infra/local/directory-listing/index.js';
import { ContentTypeCatalog } from '../locator/content-type-catalog.js';
import { StorageLocationResolver } from '../locator/storage-location-resolver.js';
import { VersionSelector } from '../locator/version-selector.js';
import { PathInfoFactory } from '../locator/path-info.js';
import { ReleasePathInfo } from '../release/release-path-info.js';
import { ReleaseFileNames } from '../release/release-file-names.js';
import { LocalFtpPathInfo } from '../release/local-ftp-path-info.js';
import { ChemRefPathInfo } from '../locator/chem-ref-path-info.js';
import { DataMaintenance } from '../maintenance/data-maintenance.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Defaults to process.env; only read when no site config is registered yet. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, AppError> {
  // Tests register a config explicitly before initialization; don't overwrite it.
  if (container.isRegistered(DI.Config.Site)) return ok(undefined);

  const logger = createBootstrapLogger('container');
  return loadSiteConfig({ env: options.env ?? process.env })
    .map((config) => {
      logger.debug({ archiveRoot: config.archiveRoot, uiRoot: config.uiRoot }, 'Site configuration loaded');
      container.register<ValidatedSiteConfig>(DI.Config.Site, { useValue: config });
    })
    .mapErr((error) => {
      logger.debug({ tag: error._tag }, 'Site configuration rejected');
      return error;
    });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  // Tests may override the logger factory and the directory listing; only register when missing.
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
  if (!container.isRegistered(DI.Infra.DirectoryListing)) {
    container.register(DI.Infra.DirectoryListing, {
      useFactory: instanceCachingFactory(() => new LocalDirectoryListing()),
    });
  }

  container.register(DI.Locator.Catalog, {
    useFactory: instanceCachingFactory(
      (c) => new ContentTypeCatalog(c.resolve<ValidatedSiteConfig>(DI.Config.Site).catalog)
    ),
  });
  container.register(DI.Locator.StorageResolver, {
    useFactory: instanceCachingFactory((c) => c.resolve(StorageLocationResolver)),
  });
  container.register(DI.Locator.VersionSelector, {
    useFactory: instanceCachingFactory((c) => c.resolve(VersionSelector)),
  });
  container.register(DI.Locator.PathInfoFactory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PathInfoFactory)),
  });

  container.register(DI.Locator.ChemRef, {
    useFactory: instanceCachingFactory((c) => c.resolve(ChemRefPathInfo)),
  });

  container.register(DI.Release.PathInfo, {
    useFactory: instanceCachingFactory((c) => c.resolve(ReleasePathInfo)),
  });
  container.register(DI.Release.FileNames, {
    useFactory: instanceCachingFactory((c) => c.resolve(ReleaseFileNames)),
  });
  container.register(DI.Release.LocalFtp, {
    useFactory: instanceCachingFactory((c) => c.resolve(LocalFtpPathInfo)),
  });

  container.register(DI.Maintenance.DataMaintenance, {
    useFactory: instanceCachingFactory((c) => c.resolve(DataMaintenance)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: runtime, site config, then services.
 * Idempotent. A config that fails validation is returned as an error, not thrown.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  registerRuntime(options);
  const configured = registerConfig(options);
  if (configured.isErr()) return err(configured.error);

  registerServices();
  initialized = true;
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };

/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in container.ts
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated site configuration (roots + content catalog data) */
    Site: Symbol('Config.Site'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Directory listing port (local filesystem in production) */
    DirectoryListing: Symbol('Infra.DirectoryListing'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOCATOR
  // ═══════════════════════════════════════════════════════════════════
  Locator: {
    Catalog: Symbol('Locator.Catalog'),
    StorageResolver: Symbol('Locator.StorageResolver'),
    VersionSelector: Symbol('Locator.VersionSelector'),
    /** Creates PathInfo facades bound to a session path */
    PathInfoFactory: Symbol('Locator.PathInfoFactory'),
    /** Chemical reference definition files */
    ChemRef: Symbol('Locator.ChemRef'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RELEASE AREA
  // ═══════════════════════════════════════════════════════════════════
  Release: {
    PathInfo: Symbol('Release.PathInfo'),
    FileNames: Symbol('Release.FileNames'),
    LocalFtp: Symbol('Release.LocalFtp'),
  },

  Maintenance: {
    DataMaintenance: Symbol('Maintenance.DataMaintenance'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },
} as const;

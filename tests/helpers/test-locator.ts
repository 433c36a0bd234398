import { readFileSync } from 'fs';
import { container } from 'tsyringe';
import { createValidatedSiteConfig, loadContentCatalog, BUNDLED_CATALOG_PATH } from '../../src/config/site-config.js';
import type { ValidatedSiteConfig } from '../../src/config/site-config.js';
import type { ContentCatalogData } from '../../src/config/content-catalog.schema.js';
import { ContentTypeCatalog } from '../../src/locator/content-type-catalog.js';
import { StorageLocationResolver } from '../../src/locator/storage-location-resolver.js';
import { VersionSelector } from '../../src/locator/version-selector.js';
import { PathInfo } from '../../src/locator/path-info.js';
import type { LocatorDeps } from '../../src/locator/data-file-reference.js';
import type { DirectoryListingPort } from '../../src/ports/directory-listing.port.js';
import type { ChemRefIdType } from '../../src/types/chem-ref-id-type.js';
import { DI } from '../../src/di/tokens.js';
import { InMemoryDirectoryListing } from '../fakes/directory-listing.fake.js';
import { CapturingLoggerFactory } from './test-logger.js';

export const ARCHIVE_ROOT = '/data/archive';
export const UI_ROOT = '/data/ui';

export function bundledCatalog(): ContentCatalogData {
  const result = loadContentCatalog(BUNDLED_CATALOG_PATH, (p) => readFileSync(p, 'utf8'));
  if (result.isErr()) throw new Error(result.error.message);
  return result.value;
}

export interface TestRefData {
  readonly sandboxRoot?: string | null;
  readonly projectNames?: Partial<Record<ChemRefIdType, string>>;
}

export function testSiteConfig(
  overrides: {
    uiRoot?: string | null;
    pdbFtpRoot?: string | null;
    emdbFtpRoot?: string | null;
    refData?: TestRefData;
  } = {}
): ValidatedSiteConfig {
  return createValidatedSiteConfig({ archiveRoot: ARCHIVE_ROOT, catalog: bundledCatalog(), ...overrides });
}

export interface TestLocator {
  readonly config: ValidatedSiteConfig;
  readonly listing: InMemoryDirectoryListing;
  readonly logs: CapturingLoggerFactory;
  readonly deps: LocatorDeps;
  readonly pathInfo: (sessionPath?: string) => PathInfo;
}

/** Locator collaborators wired by hand over an in-memory directory tree. */
export function createTestLocator(options: { uiRoot?: string | null } = {}): TestLocator {
  const config = testSiteConfig(options);
  const listing = new InMemoryDirectoryListing();
  const logs = new CapturingLoggerFactory();
  const deps: LocatorDeps = {
    catalog: new ContentTypeCatalog(config.catalog),
    resolver: new StorageLocationResolver(config),
    versionSelector: new VersionSelector(listing, logs),
    logger: logs.create('test'),
  };
  return { config, listing, logs, deps, pathInfo: (sessionPath) => new PathInfo(deps, sessionPath) };
}

/** Pre-registers test doubles so initializeContainer() keeps them. */
export function registerTestServices(options: {
  config?: ValidatedSiteConfig;
  listing?: DirectoryListingPort;
  logs?: CapturingLoggerFactory;
} = {}): { config: ValidatedSiteConfig; listing: DirectoryListingPort; logs: CapturingLoggerFactory } {
  const config = options.config ?? testSiteConfig();
  const listing = options.listing ?? new InMemoryDirectoryListing();
  const logs = options.logs ?? new CapturingLoggerFactory();
  container.register(DI.Config.Site, { useValue: config });
  container.register(DI.Infra.DirectoryListing, { useValue: listing });
  container.register(DI.Logging.Factory, { useValue: logs });
  return { config, listing, logs };
}

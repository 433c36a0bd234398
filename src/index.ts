import 'reflect-metadata';

// DI container
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadSiteConfig, loadContentCatalog, createValidatedSiteConfig, BUNDLED_CATALOG_PATH } from './config/site-config.js';
export type { SiteConfig, ValidatedSiteConfig, LoadSiteConfigOptions, RefDataConfig } from './config/site-config.js';
export { DEFAULT_REFDATA_PROJECT_NAMES } from './config/site-config.js';
export { ContentCatalogSchema } from './config/content-catalog.schema.js';
export type { ContentCatalogData } from './config/content-catalog.schema.js';

// Errors
export * from './errors/index.js';
export {
  LocatorError,
  LocatorErrorCodes,
  InvalidStorageClassError,
  InvalidSubdirectoryError,
  isLocatorError,
} from './core/error-handler.js';

// Logging
export { PinoLoggerFactory } from './core/logging/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';

// Domain types
export { asDataSetId, isGroupId } from './types/data-set-id.js';
export type { DataSetId } from './types/data-set-id.js';
export { STORAGE_CLASSES, parseStorageClass, isStorageClass } from './types/storage-class.js';
export type { StorageClass } from './types/storage-class.js';
export { parseVersionRequest, parsePartitionRequest } from './types/version-request.js';
export type { VersionRequest, PartitionRequest } from './types/version-request.js';
export { CHEM_REF_ID_TYPES, isChemRefIdType } from './types/chem-ref-id-type.js';
export type { ChemRefIdType } from './types/chem-ref-id-type.js';

// Filesystem port
export type { DirectoryListingPort, DirEntryWithStats, FsError } from './ports/directory-listing.port.js';
export { LocalDirectoryListing } from './infra/local/directory-listing/index.js';

// Locator, release area, maintenance
export * from './locator/index.js';
export * from './release/index.js';
export { DataMaintenance, formatTimestamp } from './maintenance/data-maintenance.js';
export type {
  PurgeStrategy,
  PurgeCandidates,
  LogFileEntry,
  VersionListQuery,
  ContentTypeListQuery,
} from './maintenance/data-maintenance.js';

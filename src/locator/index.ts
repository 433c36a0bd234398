export * from './filename-grammar.js';
export { searchPatternToRegExp, matchesSearchPattern } from './search-pattern.js';
export { ContentTypeCatalog, ANY_FORMAT } from './content-type-catalog.js';
export type { ResolvedContentType } from './content-type-catalog.js';
export { StorageLocationResolver } from './storage-location-resolver.js';
export type { StorageKeys, StorageResolutionError, MissingStorageKey } from './storage-location-resolver.js';
export { VersionSelector, selectVersion } from './version-selector.js';
export type { SymbolicVersionKind, VersionUnavailable, VersionedFile } from './version-selector.js';
export { DataFileReference } from './data-file-reference.js';
export type { LocatorDeps } from './data-file-reference.js';
export { PathInfo, PathInfoFactory } from './path-info.js';
export type { FileQuery, FileNameInfo, StandardFileOptions } from './path-info.js';
export { ChemRefPathInfo, getIdType, getCcdHash } from './chem-ref-path-info.js';
export type { ChemRefProjectInfo } from './chem-ref-path-info.js';

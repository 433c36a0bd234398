/**
 * CLI Commands - Public API
 */

export { executePathCommand, executeDirCommand } from './path.js';
export type { PathCommandDeps, DirCommandDeps } from './path.js';

export { executeParseCommand, executeValidateCommand } from './parse.js';
export type { ParseCommandDeps, ValidateCommandDeps } from './parse.js';

export { executeVersionsCommand } from './versions.js';
export type { VersionsCommandDeps } from './versions.js';

export { executeReleasePathCommand } from './release-path.js';
export type { ReleasePathCommandDeps } from './release-path.js';

export { executeChemRefCommand } from './chem-ref.js';
export type { ChemRefCommandDeps } from './chem-ref.js';

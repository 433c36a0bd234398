/**
 * Site configuration: parsed once from the environment, then injected.
 *
 * Errors are data (Result), never thrown.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { err, ok, Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { AppError, ConfigIssue, Validated } from '../errors/app-error.js';
import { ContentCatalogSchema } from './content-catalog.schema.js';
import type { ContentCatalogData } from './content-catalog.schema.js';
import type { ChemRefIdType } from '../types/chem-ref-id-type.js';

export type StorageRoot = Brand<string, 'StorageRoot'>;

/** Checked-out chemical reference repositories: `{sandboxRoot}/{projectName}` per id type. */
export interface RefDataConfig {
  /** Null when no sandbox is configured; repository paths are then unavailable. */
  readonly sandboxRoot: StorageRoot | null;
  readonly projectNames: Readonly<Record<ChemRefIdType, string>>;
}

export const DEFAULT_REFDATA_PROJECT_NAMES: Readonly<Record<ChemRefIdType, string>> = {
  CC: 'ligand-dict-v3',
  PRDCC: 'prdcc-v3',
  PRD: 'prd-v3',
  PRD_FAMILY: 'family-v3',
};

export interface SiteConfig {
  readonly archiveRoot: StorageRoot;
  /** Separate deposition-UI storage; null when absent or equal to the archive root. */
  readonly uiRoot: StorageRoot | null;
  readonly pdbFtpRoot: StorageRoot | null;
  readonly emdbFtpRoot: StorageRoot | null;
  readonly refData: RefDataConfig;
  readonly catalog: ContentCatalogData;
}

export type ValidatedSiteConfig = Validated<SiteConfig>;

export interface LoadSiteConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Overridable for tests. */
  readonly readFileUtf8?: (filePath: string) => string;
}

export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../../config/content-catalog.json', import.meta.url));

const AbsolutePath = z
  .string()
  .min(1)
  .refine((p) => p.startsWith('/'), 'must be an absolute path')
  .transform(stripTrailingSlashes);

const ProjectName = z
  .string()
  .min(1)
  .refine((name) => !name.includes('/'), 'must be a single directory name');

const EnvSchema = z.object({
  SITE_ARCHIVE_STORAGE_PATH: AbsolutePath,
  SITE_ARCHIVE_UI_STORAGE_PATH: AbsolutePath.optional(),
  SITE_PDB_FTP_ROOT_DIR: AbsolutePath.optional(),
  SITE_EMDB_FTP_ROOT_DIR: AbsolutePath.optional(),
  SITE_CONTENT_CATALOG_PATH: z.string().min(1).optional(),
  SITE_REFDATA_SANDBOX_PATH: AbsolutePath.optional(),
  SITE_REFDATA_PROJ_NAME_CC: ProjectName.optional(),
  SITE_REFDATA_PROJ_NAME_PRDCC: ProjectName.optional(),
  SITE_REFDATA_PROJ_NAME_PRD: ProjectName.optional(),
  SITE_REFDATA_PROJ_NAME_PRD_FAMILY: ProjectName.optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type LoadSiteConfigResult = Result<ValidatedSiteConfig, AppError>;

export function loadSiteConfig(options: LoadSiteConfigOptions): LoadSiteConfigResult {
  const parsed = EnvSchema.safeParse(options.env);
  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  const catalogPath = parsed.data.SITE_CONTENT_CATALOG_PATH ?? BUNDLED_CATALOG_PATH;
  const read = options.readFileUtf8 ?? ((p: string) => readFileSync(p, 'utf8'));

  return loadContentCatalog(catalogPath, read).map((catalog) => buildConfig(parsed.data, catalog));
}

export function loadContentCatalog(
  source: string,
  read: (filePath: string) => string
): Result<ContentCatalogData, AppError> {
  const safeRead = Result.fromThrowable(read, (e) =>
    Err.catalogLoadFailed(source, [{ path: '(file)', message: e instanceof Error ? e.message : String(e) }])
  );
  const safeParseJson = Result.fromThrowable(
    (text: string): unknown => JSON.parse(text),
    (e) => Err.catalogLoadFailed(source, [{ path: '(json)', message: e instanceof Error ? e.message : String(e) }])
  );

  return safeRead(source)
    .andThen(safeParseJson)
    .andThen((raw) => {
      const catalog = ContentCatalogSchema.safeParse(raw);
      return catalog.success
        ? ok(catalog.data)
        : err(Err.catalogLoadFailed(source, toConfigIssues(catalog.error)));
    });
}

/**
 * Tests and local construction only: skips env parsing.
 * (Still branded as validated so raw objects cannot be passed by accident.)
 */
export function createValidatedSiteConfig(value: {
  readonly archiveRoot: string;
  readonly uiRoot?: string | null;
  readonly pdbFtpRoot?: string | null;
  readonly emdbFtpRoot?: string | null;
  readonly refData?: {
    readonly sandboxRoot?: string | null;
    readonly projectNames?: Partial<Record<ChemRefIdType, string>>;
  };
  readonly catalog: ContentCatalogData;
}): ValidatedSiteConfig {
  const archiveRoot = stripTrailingSlashes(value.archiveRoot);
  return brand({
    archiveRoot: archiveRoot as StorageRoot,
    uiRoot: distinctUiRoot(archiveRoot, value.uiRoot ?? undefined),
    pdbFtpRoot: optionalRoot(value.pdbFtpRoot ?? undefined),
    emdbFtpRoot: optionalRoot(value.emdbFtpRoot ?? undefined),
    refData: {
      sandboxRoot: optionalRoot(value.refData?.sandboxRoot ?? undefined),
      projectNames: { ...DEFAULT_REFDATA_PROJECT_NAMES, ...value.refData?.projectNames },
    },
    catalog: value.catalog,
  });
}

function buildConfig(env: ParsedEnv, catalog: ContentCatalogData): ValidatedSiteConfig {
  return brand({
    archiveRoot: env.SITE_ARCHIVE_STORAGE_PATH as StorageRoot,
    uiRoot: distinctUiRoot(env.SITE_ARCHIVE_STORAGE_PATH, env.SITE_ARCHIVE_UI_STORAGE_PATH),
    pdbFtpRoot: optionalRoot(env.SITE_PDB_FTP_ROOT_DIR),
    emdbFtpRoot: optionalRoot(env.SITE_EMDB_FTP_ROOT_DIR),
    refData: {
      sandboxRoot: optionalRoot(env.SITE_REFDATA_SANDBOX_PATH),
      projectNames: {
        CC: env.SITE_REFDATA_PROJ_NAME_CC ?? DEFAULT_REFDATA_PROJECT_NAMES.CC,
        PRDCC: env.SITE_REFDATA_PROJ_NAME_PRDCC ?? DEFAULT_REFDATA_PROJECT_NAMES.PRDCC,
        PRD: env.SITE_REFDATA_PROJ_NAME_PRD ?? DEFAULT_REFDATA_PROJECT_NAMES.PRD,
        PRD_FAMILY: env.SITE_REFDATA_PROJ_NAME_PRD_FAMILY ?? DEFAULT_REFDATA_PROJECT_NAMES.PRD_FAMILY,
      },
    },
    catalog,
  });
}

function brand(config: SiteConfig): ValidatedSiteConfig {
  return config as ValidatedSiteConfig;
}

function distinctUiRoot(archiveRoot: string, uiRoot: string | undefined): StorageRoot | null {
  if (uiRoot === undefined) return null;
  const normalized = stripTrailingSlashes(uiRoot);
  return normalized === archiveRoot ? null : (normalized as StorageRoot);
}

function optionalRoot(value: string | undefined): StorageRoot | null {
  return value === undefined ? null : (stripTrailingSlashes(value) as StorageRoot);
}

function stripTrailingSlashes(p: string): string {
  const trimmed = p.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

#!/usr/bin/env node
/**
 * archive-locator CLI - Composition Root
 *
 * 1. Builds the container from the site configuration in the environment
 * 2. Wires services into each command
 * 3. Interprets CliResult into process termination
 *
 * Command logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { PathInfo, PathInfoFactory, FileQuery } from './locator/path-info.js';
import type { ReleasePathInfo } from './release/release-path-info.js';
import type { ChemRefPathInfo } from './locator/chem-ref-path-info.js';
import type { DataMaintenance, PurgeStrategy } from './maintenance/data-maintenance.js';
import { formatAppError } from './errors/formatter.js';
import { failure } from './cli/types/index.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import {
  executePathCommand,
  executeDirCommand,
  executeParseCommand,
  executeValidateCommand,
  executeVersionsCommand,
  executeReleasePathCommand,
  executeChemRefCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Wired {
  readonly terminator: ProcessTerminator;
  readonly pathInfo: (sessionPath?: string) => PathInfo;
}

function wire(): Wired | null {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    interpretCliResultWithoutDI(
      failure(formatAppError(initialized.error), {
        exitCode: { kind: 'misuse' },
        suggestions: ['Set SITE_ARCHIVE_STORAGE_PATH to the archive root'],
      })
    );
    return null;
  }
  const factory = container.resolve<PathInfoFactory>(DI.Locator.PathInfoFactory);
  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    pathInfo: (sessionPath) => factory.create(sessionPath),
  };
}

interface FileOptions {
  readonly storage: string;
  readonly version: string;
  readonly partition: string;
  readonly milestone?: string;
  readonly instance?: string;
  readonly session: string;
}

function toQuery(dataSetId: string, contentType: string, formatType: string, o: FileOptions): Omit<FileQuery, 'version'> {
  return {
    dataSetId,
    contentType,
    formatType,
    storageClass: o.storage,
    partition: o.partition,
    milestone: o.milestone ?? null,
    workflowInstanceId: o.instance ?? null,
  };
}

function parsePurge(value: string): PurgeStrategy {
  if (value === 'exp' || value === 'other') return value;
  throw new InvalidArgumentError('expected exp or other');
}

function withFileOptions(cmd: Command): Command {
  return cmd
    .option('-s, --storage <class>', 'storage class (archive, deposit, wf-instance, session, ...)', 'archive')
    .option('-v, --version <version>', 'version number, latest, next, previous or none', 'latest')
    .option('-p, --partition <partition>', 'partition number or next', '1')
    .option('-m, --milestone <milestone>', 'milestone variant (upload, deposit, annotate, ...)')
    .option('-i, --instance <id>', 'workflow instance id (wf-instance storage)')
    .option('--session <dir>', 'session directory (session storage classes)', '.');
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('archive-locator')
  .description('Locate, name and parse versioned data files of the deposition archive')
  .version('0.1.0', '-V, --cli-version');

withFileOptions(
  program
    .command('path <dataSetId> <contentType> <formatType>')
    .description('Print the full path of a managed file')
).action((dataSetId: string, contentType: string, formatType: string, options: FileOptions) => {
  const w = wire();
  if (w === null) return;
  const pathInfo = w.pathInfo(options.session);
  const query = { ...toQuery(dataSetId, contentType, formatType, options), version: options.version };
  const result = executePathCommand(query, {
    getFilePath: (q) => pathInfo.getFilePath(q),
  });
  interpretCliResult(result, w.terminator);
});

program
  .command('dir <dataSetId>')
  .description('Print the storage directory of a dataset')
  .option('-s, --storage <class>', 'storage class', 'archive')
  .option('-i, --instance <id>', 'workflow instance id (wf-instance storage)')
  .option('--session <dir>', 'session directory (session storage classes)', '.')
  .action((dataSetId: string, options: { storage: string; instance?: string; session: string }) => {
    const w = wire();
    if (w === null) return;
    const pathInfo = w.pathInfo(options.session);
    const result = executeDirCommand(
      { dataSetId, storageClass: options.storage, workflowInstanceId: options.instance ?? null },
      { getDirPath: (q) => pathInfo.getDirPath(q) }
    );
    interpretCliResult(result, w.terminator);
  });

program
  .command('parse <fileName>')
  .description('Decompose a managed filename into its fields')
  .option('--partial', 'recover what fields it can from a non-conforming name')
  .action((fileName: string, options: { partial?: boolean }) => {
    const w = wire();
    if (w === null) return;
    const pathInfo = w.pathInfo();
    const result = executeParseCommand(fileName, options, {
      parseFileName: (f) => pathInfo.parseFileName(f),
      splitFileName: (f) => pathInfo.splitFileName(f),
    });
    interpretCliResult(result, w.terminator);
  });

program
  .command('validate <fileNames...>')
  .description('Check filenames against the naming scheme')
  .option('--no-require-version', 'accept names without a .V<n> suffix')
  .action((fileNames: string[], options: { requireVersion: boolean }) => {
    const w = wire();
    if (w === null) return;
    const pathInfo = w.pathInfo();
    const result = executeValidateCommand(fileNames, options, {
      isValidFileName: (f, requireVersion) => pathInfo.isValidFileName(f, requireVersion),
    });
    interpretCliResult(result, w.terminator);
  });

withFileOptions(
  program
    .command('versions <dataSetId> <contentType> <formatType>')
    .description('List versions of a content object, newest first')
    .option('--purge <strategy>', 'also show purge candidates (exp or other)', parsePurge)
).action(
  (dataSetId: string, contentType: string, formatType: string, options: FileOptions & { purge?: PurgeStrategy }) => {
    const w = wire();
    if (w === null) return;
    const maintenance = container.resolve<DataMaintenance>(DI.Maintenance.DataMaintenance);
    maintenance.setSessionPath(options.session);
    const query = toQuery(dataSetId, contentType, formatType, options);
    const result = executeVersionsCommand(query, { purge: options.purge }, {
      getVersionFileList: (q) => maintenance.getVersionFileList(q),
      getPurgeCandidates: (q, s) => maintenance.getPurgeCandidates(q, s),
    });
    interpretCliResult(result, w.terminator);
  }
);

program
  .command('release-path')
  .description('Print a for-release directory')
  .option('--subdir <name>', 'added, modified, obsolete, emd, val_reports or em-val-reports')
  .option('--previous', 'the previous release cycle')
  .option('--accession <id>', 'entry accession (EM sub paths need one)')
  .option('--em-sub-path <name>', 'header, map, fsc, images, masks, other or validation')
  .action((options: { subdir?: string; previous?: boolean; accession?: string; emSubPath?: string }) => {
    const w = wire();
    if (w === null) return;
    const release = container.resolve<ReleasePathInfo>(DI.Release.PathInfo);
    const result = executeReleasePathCommand(
      {
        subdir: options.subdir ?? null,
        version: options.previous ? 'previous' : 'current',
        accession: options.accession ?? null,
        emSubPath: options.emSubPath ?? null,
      },
      { getForReleasePath: (q) => release.getForReleasePath(q) }
    );
    interpretCliResult(result, w.terminator);
  });

program
  .command('chem-ref <idCode>')
  .description('Print the repository path of a chemical reference definition')
  .action((idCode: string) => {
    const w = wire();
    if (w === null) return;
    const chemRef = container.resolve<ChemRefPathInfo>(DI.Locator.ChemRef);
    const result = executeChemRefCommand(idCode, {
      getIdType: (id) => chemRef.getIdType(id),
      getFilePath: (id) => chemRef.getFilePath(id),
    });
    interpretCliResult(result, w.terminator);
  });

program.parse();

import * as fs from 'fs';
import * as path from 'path';
import { ok, Result } from 'neverthrow';
import type { DirEntryWithStats, DirectoryListingPort, FsError } from '../../../ports/directory-listing.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function mapFsError(e: unknown, dirPath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOTDIR') return { code: 'FS_NOT_DIRECTORY', message: `Not a directory: ${dirPath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${dirPath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${dirPath}: ${e instanceof Error ? e.message : String(e)}` };
}

/**
 * Local filesystem directory listing. Returns entry names; a missing
 * directory lists as empty.
 */
export class LocalDirectoryListing implements DirectoryListingPort {
  readdir(dirPath: string): Result<readonly string[], FsError> {
    if (!fs.existsSync(dirPath)) return ok([]);
    return Result.fromThrowable(
      () => fs.readdirSync(dirPath),
      (e) => mapFsError(e, dirPath)
    )().map((names) => [...names].sort());
  }

  readdirWithStats(dirPath: string): Result<readonly DirEntryWithStats[], FsError> {
    return this.readdir(dirPath).andThen((names) => {
      const entries: DirEntryWithStats[] = [];
      for (const name of names) {
        const stat = statOrNull(path.join(dirPath, name));
        if (stat === null) continue;
        entries.push({ name, mtimeMs: stat.mtimeMs, sizeBytes: stat.size, isFile: stat.isFile() });
      }
      return ok(entries);
    });
  }
}

function statOrNull(filePath: string): fs.Stats | null {
  const r = Result.fromThrowable(() => fs.statSync(filePath), () => null)();
  return r.isOk() ? r.value : null;
}


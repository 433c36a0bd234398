import type { Result } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

export interface DirEntryWithStats {
  readonly name: string;
  readonly mtimeMs: number;
  readonly sizeBytes: number;
  readonly isFile: boolean;
}

/**
 * Port: directory listing, the only filesystem access the locator needs.
 *
 * Synchronous: every symbolic version resolution re-lists its directory and
 * callers expect a path back in the same call.
 */
export interface DirectoryListingPort {
  /**
   * Entry names (not full paths). A missing directory is an empty list.
   */
  readdir(dirPath: string): Result<readonly string[], FsError>;

  /**
   * Entries with size and modification time. Entries that fail stat are skipped.
   * A missing directory is an empty list.
   */
  readdirWithStats(dirPath: string): Result<readonly DirEntryWithStats[], FsError>;
}

export {
  ReleasePathInfo,
  RELEASE_SUBDIRS,
  RELEASE_VERSIONS,
  EMD_SUB_PATHS,
} from './release-path-info.js';
export type { ReleaseSubdir, ReleaseVersion, EmdSubPath, ForReleaseQuery } from './release-path-info.js';
export { ReleaseFileNames, RELEASED_CONTENT, toEmdbHyphen, toEmdbUnderscore } from './release-file-names.js';
export type { ReleasedContent } from './release-file-names.js';
export { LocalFtpPathInfo } from './local-ftp-path-info.js';
export type { PdbFtpContent } from './local-ftp-path-info.js';

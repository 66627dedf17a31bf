/**
 * File operation exports
 */

export {
  DirectoryEnumerator,
  isDirectoryFailure,
  type FileMetadata,
  type DirectoryMetadata,
  type DirectoryContents,
  type DirectoryFailure,
  type DirectoryListing,
  type EnumerateOptions,
} from './directory-enumerator.js';

export {
  listAllowedFiles,
  type ListFilesRequest,
  type ListFilesResult,
} from './file-lister.js';

export { readContainedFile, type FileContent } from './file-reader.js';

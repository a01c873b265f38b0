/**
 * File access used by the snapshot store, the workflow loader and the
 * built-in file tools. Every operation reports failure as a Result so
 * callers decide whether a missing file is an error.
 */

import { Result } from './result';

export interface WriteOptions {
  /** Create missing parent directories first */
  createParents?: boolean;
}

export interface ListOptions {
  /** Glob (`*`, `?`) matched against entry names */
  pattern?: string;
}

export interface FileStats {
  size: number;
  isDirectory: boolean;
  modifiedAt: Date;
}

export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'OUTSIDE_ROOT'
  | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  /** Raw bytes, for content that is validated before decoding */
  readBytes(path: string): Promise<Result<Buffer, FileSystemError>>;

  writeFile(path: string, content: string | Uint8Array, options?: WriteOptions): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  stat(path: string): Promise<Result<FileStats, FileSystemError>>;

  /** mkdir -p; succeeds when the directory already exists */
  ensureDir(path: string): Promise<Result<void, FileSystemError>>;

  /** Deletes a single file */
  remove(path: string): Promise<Result<void, FileSystemError>>;

  /** Sorted names of the entries directly inside a directory */
  list(path: string, options?: ListOptions): Promise<Result<string[], FileSystemError>>;

  copy(from: string, to: string): Promise<Result<void, FileSystemError>>;

  /** Moves a file over `to`, replacing whatever is there */
  rename(from: string, to: string): Promise<Result<void, FileSystemError>>;

  resolve(...segments: string[]): string;
  join(...segments: string[]): string;
}

const MESSAGES: Record<FileSystemErrorCode, (path: string) => string> = {
  NOT_FOUND: (path) => `No such file or directory: ${path}`,
  PERMISSION_DENIED: (path) => `Permission denied: ${path}`,
  NOT_A_FILE: (path) => `Is a directory: ${path}`,
  NOT_A_DIRECTORY: (path) => `Not a directory: ${path}`,
  OUTSIDE_ROOT: (path) => `Path is outside the working directory: ${path}`,
  IO_ERROR: (path) => `I/O failure on ${path}`,
};

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  return { code, path, message: message ?? MESSAGES[code](path), cause };
}

/**
 * Anchored RegExp for a glob where `*` is any run of characters and `?`
 * a single one
 */
export function globToRegex(glob: string): RegExp {
  let source = '';
  for (const char of glob) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

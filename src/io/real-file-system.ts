/**
 * FileSystem over node:fs. With a root, relative paths resolve against it
 * and anything that would land outside it fails with OUTSIDE_ROOT.
 */

import { promises as fs } from 'fs';
import { dirname, isAbsolute, join, relative, resolve } from 'path';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  ListOptions,
  FileSystemError,
  FileSystemErrorCode,
  createFileSystemError,
  globToRegex,
} from '../types/file-system';
import { Result, ok, err, toError } from '../types/result';

const ERRNO_CODES: Record<string, FileSystemErrorCode> = {
  ENOENT: 'NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EISDIR: 'NOT_A_FILE',
  ENOTDIR: 'NOT_A_DIRECTORY',
};

function fromNodeError(error: unknown, path: string): FileSystemError {
  const cause = toError(error);
  const errno = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  const code = ERRNO_CODES[errno];
  return code
    ? createFileSystemError(code, path, undefined, cause)
    : createFileSystemError('IO_ERROR', path, cause.message, cause);
}

export class RealFileSystem implements FileSystem {
  private readonly root: string | null;

  constructor(root?: string) {
    this.root = root ? resolve(root) : null;
  }

  readFile(path: string): Promise<Result<string, FileSystemError>> {
    return this.run(path, (target) => fs.readFile(target, 'utf-8'));
  }

  readBytes(path: string): Promise<Result<Buffer, FileSystemError>> {
    return this.run(path, (target) => fs.readFile(target));
  }

  writeFile(path: string, content: string | Uint8Array, options: WriteOptions = {}): Promise<Result<void, FileSystemError>> {
    return this.run(path, async (target) => {
      if (options.createParents) {
        await fs.mkdir(dirname(target), { recursive: true });
      }
      await fs.writeFile(target, content);
    });
  }

  async exists(path: string): Promise<boolean> {
    const found = await this.run(path, (target) => fs.access(target));
    return found.ok;
  }

  stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    return this.run(path, async (target) => {
      const stats = await fs.stat(target);
      return { size: stats.size, isDirectory: stats.isDirectory(), modifiedAt: stats.mtime };
    });
  }

  ensureDir(path: string): Promise<Result<void, FileSystemError>> {
    return this.run(path, async (target) => {
      await fs.mkdir(target, { recursive: true });
    });
  }

  remove(path: string): Promise<Result<void, FileSystemError>> {
    return this.run(path, (target) => fs.unlink(target));
  }

  list(path: string, options: ListOptions = {}): Promise<Result<string[], FileSystemError>> {
    const matcher = options.pattern ? globToRegex(options.pattern) : null;
    return this.run(path, async (target) => {
      const names = await fs.readdir(target);
      return names.filter((name) => matcher === null || matcher.test(name)).sort();
    });
  }

  async copy(from: string, to: string): Promise<Result<void, FileSystemError>> {
    const destination = this.locate(to);
    if (!destination.ok) {
      return destination;
    }
    return this.run(from, (source) => fs.copyFile(source, destination.value));
  }

  async rename(from: string, to: string): Promise<Result<void, FileSystemError>> {
    const destination = this.locate(to);
    if (!destination.ok) {
      return destination;
    }
    return this.run(from, (source) => fs.rename(source, destination.value));
  }

  resolve(...segments: string[]): string {
    return this.root ? resolve(this.root, ...segments) : resolve(...segments);
  }

  join(...segments: string[]): string {
    return join(...segments);
  }

  private locate(path: string): Result<string, FileSystemError> {
    const target = this.resolve(path);
    if (this.root !== null) {
      const inside = relative(this.root, target);
      if (inside.startsWith('..') || isAbsolute(inside)) {
        return err(createFileSystemError('OUTSIDE_ROOT', path));
      }
    }
    return ok(target);
  }

  /** Resolves `path` inside the root and maps any thrown errno onto a FileSystemError */
  private async run<T>(path: string, action: (target: string) => Promise<T>): Promise<Result<T, FileSystemError>> {
    const target = this.locate(path);
    if (!target.ok) {
      return target;
    }
    try {
      return ok(await action(target.value));
    } catch (error) {
      return err(fromNodeError(error, path));
    }
  }
}

export function createRealFileSystem(root?: string): FileSystem {
  return new RealFileSystem(root);
}

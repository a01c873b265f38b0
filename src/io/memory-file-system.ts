/**
 * FileSystem held in a Map of absolute paths, for tests. Faults can be
 * queued against an operation to simulate a crash between the steps of a
 * snapshot write.
 */

import { dirname, join, resolve } from 'path';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  ListOptions,
  FileSystemError,
  createFileSystemError,
  globToRegex,
} from '../types/file-system';
import { Clock, SystemClock } from '../types/clock';
import { Result, ok, err } from '../types/result';

type Entry = { kind: 'file'; bytes: Buffer; modifiedAt: Date } | { kind: 'dir'; modifiedAt: Date };

export type FaultOperation = 'writeFile' | 'rename' | 'remove' | 'copy';

export interface InjectedFault {
  operation: FaultOperation;
  /** Only paths containing this text trigger the fault */
  pathIncludes?: string;
  /** Keep failing after the first hit */
  persistent?: boolean;
}

export class MemoryFileSystem implements FileSystem {
  private readonly nodes = new Map<string, Entry>();
  private faults: InjectedFault[] = [];
  private readonly cwd: string;
  private readonly clock: Clock;

  constructor(cwd = '/', clock: Clock = new SystemClock()) {
    this.cwd = resolve(cwd);
    this.clock = clock;
    this.makeDirs(this.cwd);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const file = this.fileAt(path);
    return file.ok ? ok(file.value.toString('utf-8')) : file;
  }

  async readBytes(path: string): Promise<Result<Buffer, FileSystemError>> {
    const file = this.fileAt(path);
    return file.ok ? ok(Buffer.from(file.value)) : file;
  }

  async writeFile(path: string, content: string | Uint8Array, options: WriteOptions = {}): Promise<Result<void, FileSystemError>> {
    const fault = this.takeFault('writeFile', path);
    if (fault) {
      return err(fault);
    }

    const target = this.resolve(path);
    const parent = this.nodes.get(dirname(target));
    if (parent === undefined) {
      if (!options.createParents) {
        return err(createFileSystemError('NOT_FOUND', dirname(target)));
      }
      this.makeDirs(dirname(target));
    } else if (parent.kind !== 'dir') {
      return err(createFileSystemError('NOT_A_DIRECTORY', dirname(target)));
    }
    if (this.nodes.get(target)?.kind === 'dir') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
    this.nodes.set(target, { kind: 'file', bytes, modifiedAt: this.clock.now() });
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    return this.nodes.has(this.resolve(path));
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const node = this.nodes.get(this.resolve(path));
    if (node === undefined) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    return ok({
      size: node.kind === 'file' ? node.bytes.length : 0,
      isDirectory: node.kind === 'dir',
      modifiedAt: node.modifiedAt,
    });
  }

  async ensureDir(path: string): Promise<Result<void, FileSystemError>> {
    const target = this.resolve(path);
    for (let current = target; ; current = dirname(current)) {
      const node = this.nodes.get(current);
      if (node?.kind === 'file') {
        return err(createFileSystemError('NOT_A_DIRECTORY', current));
      }
      if (node !== undefined || current === dirname(current)) {
        break;
      }
    }
    this.makeDirs(target);
    return ok(undefined);
  }

  async remove(path: string): Promise<Result<void, FileSystemError>> {
    const fault = this.takeFault('remove', path);
    if (fault) {
      return err(fault);
    }
    const file = this.fileAt(path);
    if (!file.ok) {
      return file;
    }
    this.nodes.delete(this.resolve(path));
    return ok(undefined);
  }

  async list(path: string, options: ListOptions = {}): Promise<Result<string[], FileSystemError>> {
    const directory = this.resolve(path);
    const node = this.nodes.get(directory);
    if (node === undefined) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (node.kind !== 'dir') {
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const matcher = options.pattern ? globToRegex(options.pattern) : null;
    const names: string[] = [];
    for (const entry of this.nodes.keys()) {
      if (entry === directory || dirname(entry) !== directory) {
        continue;
      }
      const name = entry.slice(directory.length).replace(/^[\\/]/, '');
      if (matcher === null || matcher.test(name)) {
        names.push(name);
      }
    }
    return ok(names.sort());
  }

  async copy(from: string, to: string): Promise<Result<void, FileSystemError>> {
    const fault = this.takeFault('copy', from);
    if (fault) {
      return err(fault);
    }
    const file = this.fileAt(from);
    return file.ok ? this.writeFile(to, file.value) : file;
  }

  async rename(from: string, to: string): Promise<Result<void, FileSystemError>> {
    const fault = this.takeFault('rename', from);
    if (fault) {
      return err(fault);
    }

    const source = this.resolve(from);
    const destination = this.resolve(to);
    const node = this.nodes.get(source);
    if (node === undefined) {
      return err(createFileSystemError('NOT_FOUND', from));
    }
    if (this.nodes.get(dirname(destination))?.kind !== 'dir') {
      return err(createFileSystemError('NOT_FOUND', dirname(destination)));
    }

    this.nodes.delete(source);
    this.nodes.set(destination, node);
    return ok(undefined);
  }

  resolve(...segments: string[]): string {
    return resolve(this.cwd, ...segments);
  }

  join(...segments: string[]): string {
    return join(...segments);
  }

  /** Queue a failure for the next matching operation */
  injectFault(fault: InjectedFault): void {
    this.faults.push(fault);
  }

  clearFaults(): void {
    this.faults = [];
  }

  /** Backdate (or postdate) an entry's modification time */
  touch(path: string, modifiedAt: Date): void {
    const node = this.nodes.get(this.resolve(path));
    if (node !== undefined) {
      node.modifiedAt = modifiedAt;
    }
  }

  /** Every stored file, as sorted absolute paths */
  filePaths(): string[] {
    return Array.from(this.nodes)
      .filter(([, node]) => node.kind === 'file')
      .map(([path]) => path)
      .sort();
  }

  private fileAt(path: string): Result<Buffer, FileSystemError> {
    const node = this.nodes.get(this.resolve(path));
    if (node === undefined) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    return node.kind === 'file' ? ok(node.bytes) : err(createFileSystemError('NOT_A_FILE', path));
  }

  private makeDirs(target: string): void {
    const missing: string[] = [];
    for (let current = target; !this.nodes.has(current); current = dirname(current)) {
      missing.push(current);
      if (current === dirname(current)) {
        break;
      }
    }
    const now = this.clock.now();
    for (const dir of missing.reverse()) {
      this.nodes.set(dir, { kind: 'dir', modifiedAt: now });
    }
  }

  private takeFault(operation: FaultOperation, path: string): FileSystemError | null {
    const index = this.faults.findIndex(
      (fault) => fault.operation === operation && (fault.pathIncludes === undefined || path.includes(fault.pathIncludes))
    );
    if (index === -1) {
      return null;
    }
    if (!this.faults[index].persistent) {
      this.faults.splice(index, 1);
    }
    return createFileSystemError('IO_ERROR', path, `Injected ${operation} failure: ${path}`);
  }
}

export function createMemoryFileSystem(cwd?: string, clock?: Clock): MemoryFileSystem {
  return new MemoryFileSystem(cwd, clock);
}

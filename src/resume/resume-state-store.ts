/**
 * Resume State Store
 *
 * One file per workflow id under the storage directory. Writes go
 * through `<id>.json.tmp` and a `<id>.json.backup` copy of the previous
 * version, so the live file is always either the old or the new snapshot.
 */

import { gzipSync, gunzipSync } from 'zlib';
import { FileSystem, FileSystemError } from '../types/file-system';
import { Logger } from '../types/logger';
import { Clock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { ResumeSnapshot, SnapshotSummary } from '../types/resume-snapshot';
import { WorkflowError, createWorkflowError } from '../types/workflow-error';
import { parseResumeFileHeader, ValidationResult } from '../schemas/validators';
import { ResumeFileHeader } from '../schemas/resume-file.schema';
import { serializeSnapshot, deserializeSnapshot } from './resume-codec';
import { isValidWorkflowId } from './workflow-id';

const SNAPSHOT_PATTERN = '*.json';
const TEMP_SUFFIX = '.tmp';
const BACKUP_SUFFIX = '.backup';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ResumeStateStoreOptions {
  /** Absolute storage directory */
  directory: string;
  fileSystem: FileSystem;
  logger: Logger;
  clock: Clock;
  enableCompression?: boolean;
  compressionThresholdBytes?: number;
  enableAtomicWrites?: boolean;
  enableBackup?: boolean;
}

export interface SaveResult {
  path: string;
  sizeBytes: number;
  compressed: boolean;
}

export interface CleanupOptions {
  retentionDays: number;
}

/**
 * Snapshot persistence used by the orchestrator
 */
export interface SnapshotStore {
  save(snapshot: ResumeSnapshot): Promise<Result<SaveResult, WorkflowError>>;
  load(workflowId: string): Promise<Result<ResumeSnapshot | null, WorkflowError>>;
}

function isGzip(bytes: Buffer): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

function storageError(message: string, workflowId?: string, cause?: FileSystemError): WorkflowError {
  return createWorkflowError('STORAGE_ERROR', cause ? `${message}: ${cause.message}` : message, {
    workflowId,
    cause: cause?.cause,
  });
}

export class ResumeStateStore implements SnapshotStore {
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly directory: string;
  private readonly enableCompression: boolean;
  private readonly compressionThresholdBytes: number;
  private readonly enableAtomicWrites: boolean;
  private readonly enableBackup: boolean;

  constructor(options: ResumeStateStoreOptions) {
    this.fs = options.fileSystem;
    this.logger = options.logger;
    this.clock = options.clock;
    this.directory = options.directory;
    this.enableCompression = options.enableCompression ?? true;
    this.compressionThresholdBytes = options.compressionThresholdBytes ?? 1024 * 1024;
    this.enableAtomicWrites = options.enableAtomicWrites ?? true;
    this.enableBackup = options.enableBackup ?? true;
  }

  getDirectory(): string {
    return this.directory;
  }

  pathFor(workflowId: string): string {
    return this.fs.join(this.directory, `${workflowId}.json`);
  }

  async save(snapshot: ResumeSnapshot): Promise<Result<SaveResult, WorkflowError>> {
    const { workflowId } = snapshot;
    if (!isValidWorkflowId(workflowId)) {
      return err(storageError(`Invalid workflow id: ${workflowId}`, workflowId));
    }

    const dirResult = await this.fs.ensureDir(this.directory);
    if (!dirResult.ok) {
      return err(storageError('Cannot create storage directory', workflowId, dirResult.error));
    }

    const json = Buffer.from(serializeSnapshot(snapshot), 'utf-8');
    const compressed = this.enableCompression && json.length > this.compressionThresholdBytes;
    const payload = compressed ? gzipSync(json) : json;
    const path = this.pathFor(workflowId);

    const written = this.enableAtomicWrites
      ? await this.writeAtomically(path, payload, workflowId)
      : await this.writeDirectly(path, payload, workflowId);
    if (!written.ok) {
      return written;
    }

    this.logger.event('checkpoint_saved', `Saved snapshot ${workflowId}`, {
      workflowId,
      status: snapshot.status,
      sizeBytes: payload.length,
      compressed,
    });
    return ok({ path, sizeBytes: payload.length, compressed });
  }

  private async writeDirectly(
    path: string,
    payload: Buffer,
    workflowId: string
  ): Promise<Result<void, WorkflowError>> {
    const result = await this.fs.writeFile(path, payload);
    return result.ok ? ok(undefined) : err(storageError('Failed to write snapshot', workflowId, result.error));
  }

  private async writeAtomically(
    path: string,
    payload: Buffer,
    workflowId: string
  ): Promise<Result<void, WorkflowError>> {
    const tempPath = path + TEMP_SUFFIX;
    const backupPath = path + BACKUP_SUFFIX;

    let backedUp = false;
    if (this.enableBackup && (await this.fs.exists(path))) {
      const copied = await this.fs.copy(path, backupPath);
      if (!copied.ok) {
        return err(storageError('Failed to back up snapshot', workflowId, copied.error));
      }
      backedUp = true;
    }

    const written = await this.fs.writeFile(tempPath, payload);
    if (!written.ok) {
      await this.rollback(path, tempPath, backedUp ? backupPath : null);
      return err(storageError('Failed to write snapshot', workflowId, written.error));
    }

    const renamed = await this.fs.rename(tempPath, path);
    if (!renamed.ok) {
      await this.rollback(path, tempPath, backedUp ? backupPath : null);
      return err(storageError('Failed to replace snapshot', workflowId, renamed.error));
    }

    if (backedUp) {
      const removed = await this.fs.remove(backupPath);
      if (!removed.ok) {
        // The new snapshot is already live; a stale backup is ignored on load
        this.logger.warn(`Could not remove snapshot backup: ${removed.error.message}`, { workflowId });
      }
    }
    return ok(undefined);
  }

  private async rollback(path: string, tempPath: string, backupPath: string | null): Promise<void> {
    if (backupPath) {
      const restored = await this.fs.rename(backupPath, path);
      if (!restored.ok) {
        this.logger.error(`Could not restore snapshot backup: ${restored.error.message}`, { path });
      }
    }
    if (await this.fs.exists(tempPath)) {
      const removed = await this.fs.remove(tempPath);
      if (!removed.ok) {
        this.logger.warn(`Could not remove temp snapshot: ${removed.error.message}`, { path });
      }
    }
  }

  /**
   * Load a snapshot; `ok(null)` when none exists for the id
   */
  async load(workflowId: string): Promise<Result<ResumeSnapshot | null, WorkflowError>> {
    if (!isValidWorkflowId(workflowId)) {
      return err(storageError(`Invalid workflow id: ${workflowId}`, workflowId));
    }

    const path = this.pathFor(workflowId);
    if (!(await this.fs.exists(path))) {
      const backupPath = path + BACKUP_SUFFIX;
      if (!(await this.fs.exists(backupPath))) {
        return ok(null);
      }
      const restored = await this.fs.rename(backupPath, path);
      if (!restored.ok) {
        return err(storageError('Failed to restore snapshot backup', workflowId, restored.error));
      }
      this.logger.warn(`Restored snapshot ${workflowId} from backup`, { workflowId });
    }

    const bytes = await this.fs.readBytes(path);
    if (!bytes.ok) {
      return err(storageError('Failed to read snapshot', workflowId, bytes.error));
    }

    const text = this.decodeBytes(bytes.value);
    if (!text.ok) {
      return this.corrupt(workflowId, [text.error]);
    }

    const decoded = deserializeSnapshot(text.value);
    if (!decoded.success || !decoded.data) {
      return this.corrupt(workflowId, decoded.errors ?? []);
    }
    if (decoded.data.workflowId !== workflowId) {
      return this.corrupt(workflowId, [`File holds workflow ${decoded.data.workflowId}`]);
    }

    this.logger.event('snapshot_loaded', `Loaded snapshot ${workflowId}`, {
      workflowId,
      status: decoded.data.status,
      messages: decoded.data.chatHistory.length,
    });
    return ok(decoded.data);
  }

  private decodeBytes(bytes: Buffer): Result<string, string> {
    if (!isGzip(bytes)) {
      return ok(bytes.toString('utf-8'));
    }
    try {
      return ok(gunzipSync(bytes).toString('utf-8'));
    } catch (error) {
      return err(`Invalid gzip data: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private corrupt(workflowId: string, details: string[]): Result<never, WorkflowError> {
    const message = `Snapshot ${workflowId} is corrupt${details.length > 0 ? `: ${details.slice(0, 3).join('; ')}` : ''}`;
    this.logger.event('snapshot_corrupt', message, { workflowId });
    return err(createWorkflowError('SNAPSHOT_CORRUPT', message, { workflowId, resumable: false }));
  }

  /**
   * Catalog of stored snapshots, most recent activity first; files that
   * are not valid snapshots are skipped
   */
  async list(): Promise<Result<SnapshotSummary[], WorkflowError>> {
    if (!(await this.fs.exists(this.directory))) {
      return ok([]);
    }

    const names = await this.fs.list(this.directory, { pattern: SNAPSHOT_PATTERN });
    if (!names.ok) {
      return err(storageError('Failed to list snapshots', undefined, names.error));
    }

    const summaries: SnapshotSummary[] = [];
    for (const name of names.value) {
      const path = this.fs.join(this.directory, name);
      const bytes = await this.fs.readBytes(path);
      if (!bytes.ok) {
        this.logger.warn(`Skipping unreadable snapshot ${name}: ${bytes.error.message}`);
        continue;
      }
      const text = this.decodeBytes(bytes.value);
      const header: ValidationResult<ResumeFileHeader> = text.ok
        ? parseResumeFileHeader(text.value)
        : { success: false, errors: [text.error] };
      if (!header.success || !header.data) {
        this.logger.warn(`Skipping invalid snapshot ${name}: ${(header.errors ?? []).slice(0, 1).join('')}`);
        continue;
      }

      const metadata = header.data.workflow_metadata;
      summaries.push({
        workflowId: metadata.id,
        workflowFilePath: metadata.file_path,
        status: metadata.status,
        startedAt: metadata.started_at,
        lastActivity: metadata.last_checkpoint,
        currentPhase: metadata.current_phase,
        completedToolCount: header.data.completed_tools.length,
        messageCount: header.data.chat_history.length,
        sizeBytes: bytes.value.length,
        compressed: isGzip(bytes.value),
      });
    }

    summaries.sort((a, b) => Date.parse(b.lastActivity) - Date.parse(a.lastActivity));
    return ok(summaries);
  }

  async exists(workflowId: string): Promise<boolean> {
    return isValidWorkflowId(workflowId) && this.fs.exists(this.pathFor(workflowId));
  }

  /**
   * Delete a snapshot and its temp/backup siblings
   */
  async remove(workflowId: string): Promise<Result<boolean, WorkflowError>> {
    if (!isValidWorkflowId(workflowId)) {
      return err(storageError(`Invalid workflow id: ${workflowId}`, workflowId));
    }
    const path = this.pathFor(workflowId);
    const existed = await this.fs.exists(path);
    for (const candidate of [path, path + TEMP_SUFFIX, path + BACKUP_SUFFIX]) {
      if (await this.fs.exists(candidate)) {
        const removed = await this.fs.remove(candidate);
        if (!removed.ok) {
          return err(storageError('Failed to delete snapshot', workflowId, removed.error));
        }
      }
    }
    return ok(existed);
  }

  /**
   * Delete snapshots not modified within the retention window; returns
   * how many snapshots were removed
   */
  async cleanup(options: CleanupOptions): Promise<Result<number, WorkflowError>> {
    if (!(await this.fs.exists(this.directory))) {
      return ok(0);
    }

    const names = await this.fs.list(this.directory);
    if (!names.ok) {
      return err(storageError('Failed to list snapshots', undefined, names.error));
    }

    const cutoff = this.clock.timestamp() - options.retentionDays * DAY_MS;
    let removed = 0;

    for (const name of names.value) {
      const isSnapshot = name.endsWith('.json');
      const isLeftover = name.endsWith(`.json${TEMP_SUFFIX}`) || name.endsWith(`.json${BACKUP_SUFFIX}`);
      if (!isSnapshot && !isLeftover) {
        continue;
      }

      const path = this.fs.join(this.directory, name);
      const stats = await this.fs.stat(path);
      if (!stats.ok || stats.value.modifiedAt.getTime() >= cutoff) {
        continue;
      }

      const deleted = await this.fs.remove(path);
      if (!deleted.ok) {
        return err(storageError(`Failed to delete ${name}`, undefined, deleted.error));
      }
      if (isSnapshot) {
        removed += 1;
      }
    }

    this.logger.event('snapshot_cleanup', `Removed ${removed} expired snapshot(s)`, {
      retentionDays: options.retentionDays,
      removed,
    });
    return ok(removed);
  }
}

export function createResumeStateStore(options: ResumeStateStoreOptions): ResumeStateStore {
  return new ResumeStateStore(options);
}

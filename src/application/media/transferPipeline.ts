import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import type { MediaFile, TransferHandle, TransferProgress } from '@/domain/media/types';
import { resolveMediaName } from '@/domain/media/validation';
import { isPlayerError, PlayerError, validationError } from '@/domain/playback/errors';
import type { ClockPort } from '@/ports/ClockPort';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import type { MediaLibrary } from '@/application/media/mediaLibrary';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { ensureDir, isErrno, removeIfExists } from '@/shared/utils/file';

export const TRANSFER_SLICE_BYTES = 8 * 1024;
export const TEMP_DIR_NAME = '.uploads';

interface TransferJob {
  id: string;
  name: string;
  destPath: string;
  tempPath: string;
  file: FileHandle;
  bytesReceived: number;
  declaredSize: number | null;
  startedAt: number;
}

export interface TransferPipelineDeps {
  library: MediaLibrary;
  maxUploadSize: () => number;
  clock: ClockPort;
  probe?: MediaProbePort;
}

/**
 * Streams uploads into a hidden temp directory under the media directory and
 * renames them into place once complete. One writer per file name.
 */
export class TransferPipeline {
  private readonly log = createLogger('Media', 'Transfer');
  private readonly jobs = new Map<string, TransferJob>();
  /** name -> job id, reserved before any await so a second upload is refused. */
  private readonly reserved = new Map<string, string>();

  constructor(private readonly deps: TransferPipelineDeps) {}

  public get tempDir(): string {
    return path.join(this.deps.library.dir, TEMP_DIR_NAME);
  }

  public activeCount(): number {
    return this.reserved.size;
  }

  public isTransferring(name: string): boolean {
    return this.reserved.has(name);
  }

  public list(): TransferProgress[] {
    return [...this.jobs.values()].map((job) => ({
      id: job.id,
      name: job.name,
      bytesReceived: job.bytesReceived,
      declaredSize: job.declaredSize,
      startedAt: new Date(job.startedAt).toISOString(),
    }));
  }

  /** Removes temp files left behind by a previous run. */
  public async purgeStale(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.tempDir);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return 0;
      }
      throw error;
    }
    let removed = 0;
    for (const name of names) {
      if (await removeIfExists(path.join(this.tempDir, name))) {
        removed += 1;
      }
    }
    if (removed) {
      this.log.info('removed stale upload files', { count: removed });
    }
    return removed;
  }

  public async begin(rawName: unknown, declaredSize?: number | null): Promise<TransferHandle> {
    const resolved = resolveMediaName(rawName, this.deps.library.dir);
    const size = declaredSize ?? null;
    if (size !== null && (!Number.isInteger(size) || size < 0)) {
      throw validationError(`Invalid upload size: ${String(size)}`, size);
    }
    const limit = this.deps.maxUploadSize();
    if (size !== null && size > limit) {
      throw tooLarge(limit, size);
    }
    if (this.reserved.has(resolved.name)) {
      throw new PlayerError('transfer-conflict', `Upload already in progress: ${resolved.name}`, {
        value: resolved.name,
      });
    }

    const id = randomUUID();
    this.reserved.set(resolved.name, id);
    const tempPath = path.join(this.tempDir, `${id}.part`);
    try {
      await ensureDir(this.tempDir);
      const file = await fs.open(tempPath, 'wx');
      this.jobs.set(id, {
        id,
        name: resolved.name,
        destPath: resolved.absolutePath,
        tempPath,
        file,
        bytesReceived: 0,
        declaredSize: size,
        startedAt: this.deps.clock.now(),
      });
    } catch (error) {
      this.reserved.delete(resolved.name);
      throw new PlayerError('transfer-failed', `Could not start upload: ${errorMessage(error)}`, {
        value: resolved.name,
      });
    }
    this.log.info('upload started', { id, name: resolved.name, declaredSize: size });
    return { id, name: resolved.name };
  }

  public async write(handle: TransferHandle, bytes: Buffer): Promise<void> {
    const job = this.require(handle);
    const limit = this.deps.maxUploadSize();
    const total = job.bytesReceived + bytes.length;
    if (total > limit || (job.declaredSize !== null && total > job.declaredSize)) {
      await this.discard(job, 'size limit exceeded');
      throw total > limit
        ? tooLarge(limit, total)
        : new PlayerError('transfer-failed', `Upload exceeds its declared size of ${job.declaredSize} bytes`, {
            value: job.name,
          });
    }
    try {
      for (let offset = 0; offset < bytes.length; offset += TRANSFER_SLICE_BYTES) {
        const length = Math.min(TRANSFER_SLICE_BYTES, bytes.length - offset);
        await job.file.write(bytes, offset, length);
        job.bytesReceived += length;
      }
    } catch (error) {
      await this.discard(job, errorMessage(error));
      throw new PlayerError('transfer-failed', `Write failed: ${errorMessage(error)}`, { value: job.name });
    }
  }

  /** Drains `stream` into the job; the next chunk is read only after the previous write settles. */
  public async receive(handle: TransferHandle, stream: Readable): Promise<void> {
    const job = this.require(handle);
    try {
      for await (const raw of stream) {
        const chunk: unknown = raw;
        if (Buffer.isBuffer(chunk)) {
          await this.write(handle, chunk);
        } else if (typeof chunk === 'string') {
          await this.write(handle, Buffer.from(chunk));
        }
      }
    } catch (error) {
      if (isPlayerError(error)) {
        throw error;
      }
      await this.discard(job, errorMessage(error));
      throw new PlayerError('transfer-failed', `Upload interrupted: ${errorMessage(error)}`, { value: job.name });
    }
  }

  public async complete(handle: TransferHandle): Promise<MediaFile> {
    const job = this.require(handle);
    if (job.declaredSize !== null && job.bytesReceived !== job.declaredSize) {
      await this.discard(job, 'size mismatch');
      throw new PlayerError(
        'transfer-failed',
        `Upload incomplete: received ${job.bytesReceived} of ${job.declaredSize} bytes`,
        { value: job.name, bytesReceived: job.bytesReceived, declaredSize: job.declaredSize },
      );
    }
    try {
      await job.file.close();
      await fs.rename(job.tempPath, job.destPath);
    } catch (error) {
      await this.discard(job, errorMessage(error));
      throw new PlayerError('transfer-failed', `Could not store upload: ${errorMessage(error)}`, { value: job.name });
    }
    this.release(job);

    const file = await this.deps.library.describe({ name: job.name, absolutePath: job.destPath });
    const probe = this.deps.probe;
    const duration = probe
      ? await bestEffort(() => probe.probeDuration(job.destPath), {
          fallback: undefined,
          onError: 'debug',
          log: this.log,
          label: 'duration probe failed',
          context: { name: job.name },
        })
      : undefined;
    this.log.info('upload complete', { id: job.id, name: job.name, bytes: job.bytesReceived });
    return duration === undefined ? file : { ...file, duration };
  }

  /** Discards the job and its temp file; unknown handles are ignored. */
  public async abort(handle: TransferHandle, reason: string): Promise<void> {
    const job = this.jobs.get(handle.id);
    if (!job) {
      return;
    }
    await this.discard(job, reason);
  }

  private require(handle: TransferHandle): TransferJob {
    const job = this.jobs.get(handle.id);
    if (!job) {
      throw new PlayerError('transfer-failed', `Unknown or finished upload: ${handle.name}`, { value: handle.id });
    }
    return job;
  }

  private async discard(job: TransferJob, reason: string): Promise<void> {
    this.release(job);
    await bestEffort(() => job.file.close(), {
      fallback: undefined,
      onError: 'ignore',
    });
    await bestEffort(() => removeIfExists(job.tempPath), {
      fallback: false,
      onError: 'warn',
      log: this.log,
      label: 'temp file cleanup failed',
      context: { tempPath: job.tempPath },
    });
    this.log.warn('upload discarded', { id: job.id, name: job.name, reason, bytes: job.bytesReceived });
  }

  private release(job: TransferJob): void {
    this.jobs.delete(job.id);
    if (this.reserved.get(job.name) === job.id) {
      this.reserved.delete(job.name);
    }
  }
}

function tooLarge(limit: number, size: number): PlayerError {
  return new PlayerError('payload-too-large', `File too large. Maximum size is ${limit} bytes`, {
    value: size,
    limit,
  });
}

import type { Readable } from 'node:stream';
import type { MediaFile, TransferHandle } from '@/domain/media/types';
import { resolveMediaName } from '@/domain/media/validation';
import { createCommand, type CommandRequest } from '@/domain/playback/commands';
import { PlayerError } from '@/domain/playback/errors';
import type { SessionView } from '@/domain/playback/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerApiPort, PlayerHealth } from '@/ports/PlayerApiPort';
import type { MediaLibrary } from '@/application/media/mediaLibrary';
import type { TransferPipeline } from '@/application/media/transferPipeline';
import type { PlaybackController } from '@/application/playback/playbackController';
import { createLogger } from '@/shared/logging/logger';

const LOADED_STATES = new Set<SessionView['state']>(['starting', 'ready', 'playing', 'paused']);

export interface PlayerServiceDeps {
  controller: PlaybackController;
  library: MediaLibrary;
  transfers: TransferPipeline;
  config: ConfigPort;
  clock: ClockPort;
}

export class PlayerService implements PlayerApiPort {
  private readonly log = createLogger('Player', 'Service');

  constructor(private readonly deps: PlayerServiceDeps) {}

  /** Queued in call order; the file's existence is checked when the start runs. */
  public startSession(filename: unknown): Promise<SessionView> {
    return this.submit({ kind: 'start', filename });
  }

  public pause(): Promise<SessionView> {
    return this.submit({ kind: 'pause' });
  }

  public resume(): Promise<SessionView> {
    return this.submit({ kind: 'resume' });
  }

  public togglePause(): Promise<SessionView> {
    return this.submit({ kind: 'toggle-pause' });
  }

  public stop(): Promise<SessionView> {
    return this.submit({ kind: 'stop' });
  }

  public seek(seconds: unknown): Promise<SessionView> {
    return this.submit({ kind: 'seek', seconds });
  }

  public skip(delta: unknown): Promise<SessionView> {
    return this.submit({ kind: 'skip', delta });
  }

  /** Applies the level to the running player and keeps it as the default for new sessions. */
  public async setVolume(level: unknown): Promise<SessionView> {
    const view = await this.submit({ kind: 'volume', level });
    await this.deps.config.updateConfig((config) => {
      config.volume = view.volume;
    });
    return view;
  }

  public async setOutputRoute(route: unknown): Promise<SessionView> {
    const view = await this.submit({ kind: 'output-route', route });
    await this.deps.config.updateConfig((config) => {
      config.hdmiOutput = view.outputRoute;
    });
    return view;
  }

  public getStatus(): SessionView {
    return this.deps.controller.getStatus();
  }

  public onStatusChange(listener: (view: SessionView) => void): () => void {
    return this.deps.controller.onStatusChange(listener);
  }

  public async getHealth(): Promise<PlayerHealth> {
    const status = this.getStatus();
    return {
      status: status.state === 'failed' ? 'degraded' : 'healthy',
      timestamp: new Date(this.deps.clock.now()).toISOString(),
      playerRunning: this.deps.controller.isRunning(),
      state: status.state,
      mediaDir: this.deps.library.dir,
      activeTransfers: this.deps.transfers.activeCount(),
      transfers: this.deps.transfers.list(),
      diskSpace: await this.deps.library.diskUsage(),
    };
  }

  public listMedia(): Promise<MediaFile[]> {
    return this.deps.library.list();
  }

  /** Refuses while the file is being uploaded; stops playback first when it is the loaded file. */
  public async deleteMedia(name: unknown): Promise<void> {
    const { name: fileName } = resolveMediaName(name, this.deps.library.dir);
    if (this.deps.transfers.isTransferring(fileName)) {
      throw new PlayerError('transfer-conflict', `Upload in progress: ${fileName}`, { value: fileName });
    }
    const resolved = await this.deps.library.resolveExisting(fileName);
    const status = this.getStatus();
    if (status.currentFile === resolved.name && LOADED_STATES.has(status.state)) {
      this.log.info('stopping playback of deleted file', { name: resolved.name });
      await this.deps.controller.dispatch({ kind: 'stop' });
    }
    await this.deps.library.remove(resolved);
  }

  public beginUpload(name: unknown, declaredSize?: number | null): Promise<TransferHandle> {
    return this.deps.transfers.begin(name, declaredSize);
  }

  public writeChunk(handle: TransferHandle, bytes: Buffer): Promise<void> {
    return this.deps.transfers.write(handle, bytes);
  }

  public receiveUpload(handle: TransferHandle, stream: Readable): Promise<void> {
    return this.deps.transfers.receive(handle, stream);
  }

  public completeUpload(handle: TransferHandle): Promise<MediaFile> {
    return this.deps.transfers.complete(handle);
  }

  public abortUpload(handle: TransferHandle, reason: string): Promise<void> {
    return this.deps.transfers.abort(handle, reason);
  }

  private async submit(request: CommandRequest): Promise<SessionView> {
    const command = createCommand(request, { mediaDir: this.deps.library.dir });
    return this.deps.controller.dispatch(command);
  }
}

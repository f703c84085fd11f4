import type { Readable } from 'node:stream';
import type { DiskUsage, MediaFile, TransferHandle, TransferProgress } from '@/domain/media/types';
import type { SessionView } from '@/domain/playback/types';

export interface PlayerHealth {
  status: 'healthy' | 'degraded';
  timestamp: string;
  playerRunning: boolean;
  state: SessionView['state'];
  mediaDir: string;
  activeTransfers: number;
  transfers: TransferProgress[];
  diskSpace: DiskUsage | null;
}

/**
 * Operations offered to the HTTP layer.
 */
export interface PlayerApiPort {
  startSession(filename: unknown): Promise<SessionView>;
  pause(): Promise<SessionView>;
  resume(): Promise<SessionView>;
  togglePause(): Promise<SessionView>;
  stop(): Promise<SessionView>;
  seek(seconds: unknown): Promise<SessionView>;
  skip(delta: unknown): Promise<SessionView>;
  setVolume(level: unknown): Promise<SessionView>;
  setOutputRoute(route: unknown): Promise<SessionView>;
  getStatus(): SessionView;
  onStatusChange(listener: (view: SessionView) => void): () => void;
  getHealth(): Promise<PlayerHealth>;

  listMedia(): Promise<MediaFile[]>;
  deleteMedia(name: unknown): Promise<void>;
  beginUpload(name: unknown, declaredSize?: number | null): Promise<TransferHandle>;
  writeChunk(handle: TransferHandle, bytes: Buffer): Promise<void>;
  receiveUpload(handle: TransferHandle, stream: Readable): Promise<void>;
  completeUpload(handle: TransferHandle): Promise<MediaFile>;
  abortUpload(handle: TransferHandle, reason: string): Promise<void>;
}

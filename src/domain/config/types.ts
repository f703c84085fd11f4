import type { OutputRoute } from '@/domain/playback/types';

/**
 * Persisted player configuration (a single JSON file).
 */
export interface PlayerConfig {
  /** Directory holding the playable media; uploads land here. */
  mediaDir: string;
  /** Upper bound for a single upload, in bytes. */
  maxUploadSize: number;
  /** Volume applied when a session starts (0-150). */
  volume: number;
  loop: boolean;
  hardwareAccel: boolean;
  hdmiOutput: OutputRoute;
  /** Route audio to the HDMI sink even when no display is attached. */
  audioInHeadless: boolean;
  port: number;
  logLevel: string;
  /** Player binary; resolved through PATH when not absolute. */
  mpvPath: string;
  updatedAt?: string;
}

/** Keys a caller may change through the config endpoint. */

import type { OutputRoute } from '@/domain/playback/types';

export interface LaunchSpec {
  mediaPath: string;
  socketPath: string;
  volume: number;
  outputRoute: OutputRoute;
  loop: boolean;
  hardwareAccel: boolean;
  audioInHeadless: boolean;
}

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * Handle on a spawned player process.
 */
export interface PlayerProcess {
  readonly pid: number | null;
  isAlive(): boolean;
  /** Registers an exit listener; fires immediately when the process already exited. */
  onExit(listener: (exit: ProcessExit) => void): () => void;
  kill(signal: NodeJS.Signals): boolean;
  /** Resolves true once exited, false when `timeoutMs` elapses first. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  /** Last line the player wrote to stderr, for diagnostics. */
  lastDiagnostic(): string | null;
}

export interface PlayerLauncher {
  /**
   * Spawns the player and resolves once the OS reports it started.
   * Rejects with a `spawn-error` PlayerError when it cannot be started.
   */
  launch(spec: LaunchSpec): Promise<PlayerProcess>;
}

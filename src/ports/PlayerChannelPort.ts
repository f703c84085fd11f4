import type { PlayerEvent } from '@/domain/playback/events';

/** Player properties the controller reads or observes. */
export type PlayerProperty = 'time-pos' | 'duration' | 'volume' | 'pause' | 'eof-reached' | 'filename';

export type PlayerCommand =
  | { kind: 'get-property'; property: PlayerProperty }
  | { kind: 'set-property'; property: 'pause'; value: boolean }
  | { kind: 'set-property'; property: 'volume'; value: number }
  | { kind: 'seek'; seconds: number; mode: 'absolute' | 'relative' }
  | { kind: 'resync-audio' }
  | { kind: 'quit' };

export type PlayerReply = {
  /** Raw `data` field of the reply; commands without a result carry null. */
  data: unknown;
};

export type PlayerEventListener = (event: PlayerEvent) => void;

/**
 * Request/reply transport to one player process.
 */
export interface PlayerChannel {
  readonly endpoint: string;
  /** Opens the socket, waiting a bounded time for the player to create it. */
  connect(): Promise<void>;
  /** Sends one request and resolves with its correlated reply. */
  send(command: PlayerCommand): Promise<PlayerReply>;
  /** Asks the player to push changes of these properties; kept across reconnects. */
  observe(properties: readonly PlayerProperty[]): Promise<void>;
  onEvent(listener: PlayerEventListener): () => void;
  /** Invoked once when the socket closes without `close()` being called. */
  onClose(listener: (reason: string) => void): () => void;
  isConnected(): boolean;
  close(): Promise<void>;
}

export type PlayerChannelFactory = (endpoint: string) => PlayerChannel;

/**
 * Notifications pushed by the player outside the request/reply cycle,
 * decoded from its free-form property protocol into a closed set.
 */
export type PlayerEvent =
  | { type: 'position'; seconds: number }
  | { type: 'duration'; seconds: number }
  | { type: 'volume'; level: number }
  | { type: 'pause-flag'; paused: boolean }
  | { type: 'end-of-file' }
  | { type: 'file-loaded' }
  | { type: 'shutdown' };

/**
 * Inputs to the playback state machine. Each one is emitted by the component
 * that owns the evidence for it.
 */
export type SessionEvent =
  | { type: 'start-requested' }
  | { type: 'channel-ready' }
  | { type: 'start-failed'; reason: string }
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'stop-requested' }
  | { type: 'process-exited' }
  | { type: 'end-of-file' }
  | { type: 'process-died'; reason: string };

export type SessionEventType = SessionEvent['type'];

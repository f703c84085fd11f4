export const OUTPUT_ROUTES = ['auto', 'HDMI-A-1', 'HDMI-A-2'] as const;

export type OutputRoute = (typeof OUTPUT_ROUTES)[number];

export type PlaybackState =
  | { kind: 'idle' }
  | { kind: 'starting' }
  | { kind: 'ready' }
  | { kind: 'playing' }
  | { kind: 'paused' }
  | { kind: 'stopping' }
  | { kind: 'failed'; reason: string };

export type PlaybackStateKind = PlaybackState['kind'];

/** Process-level identity of the live session; null fields mean no process. */
export interface SessionIdentity {
  sessionId: string;
  pid: number | null;
  socketPath: string;
  createdAt: number;
  mediaName: string;
  mediaPath: string;
}

export interface SessionSnapshot {
  identity: SessionIdentity | null;
  state: PlaybackState;
  /** Name of the loaded file, kept after end-of-file so the view can show it. */
  currentFile: string | null;
  position: number;
  duration: number;
  volume: number;
  outputRoute: OutputRoute;
  lastError: string | null;
}

export interface SessionView {
  state: PlaybackStateKind;
  failureReason: string | null;
  currentFile: string | null;
  position: number;
  duration: number;
  volume: number;
  outputRoute: OutputRoute;
  isPaused: boolean;
  lastError: string | null;
  sessionId: string | null;
  pid: number | null;
  startedAt: string | null;
}

export const ACTIVE_STATES: ReadonlySet<PlaybackStateKind> = new Set(['playing', 'paused']);

export function isActiveState(state: PlaybackState): boolean {
  return ACTIVE_STATES.has(state.kind);
}

export function toSessionView(snapshot: SessionSnapshot): SessionView {
  const { state, identity } = snapshot;
  return {
    state: state.kind,
    failureReason: state.kind === 'failed' ? state.reason : null,
    currentFile: snapshot.currentFile,
    position: roundSeconds(snapshot.position),
    duration: roundSeconds(snapshot.duration),
    volume: snapshot.volume,
    outputRoute: snapshot.outputRoute,
    isPaused: state.kind === 'paused',
    lastError: snapshot.lastError,
    sessionId: identity?.sessionId ?? null,
    pid: identity?.pid ?? null,
    startedAt: identity ? new Date(identity.createdAt).toISOString() : null,
  };
}

function roundSeconds(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 1000) / 1000 : 0;
}

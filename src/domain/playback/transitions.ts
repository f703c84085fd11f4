import type { SessionEvent, SessionEventType } from '@/domain/playback/events';
import type { PlaybackState, PlaybackStateKind } from '@/domain/playback/types';

type Edge = {
  from: readonly PlaybackStateKind[];
  to: PlaybackStateKind;
};

/**
 * Allowed edges: for each event, the source states it may fire from and the
 * state it leads to. Events that lead to `failed` carry the reason.
 */
const EDGES: Record<SessionEventType, Edge> = {
  'start-requested': { from: ['idle', 'failed'], to: 'starting' },
  'channel-ready': { from: ['starting'], to: 'ready' },
  'start-failed': { from: ['starting'], to: 'failed' },
  play: { from: ['ready'], to: 'playing' },
  pause: { from: ['playing'], to: 'paused' },
  resume: { from: ['paused'], to: 'playing' },
  'stop-requested': { from: ['ready', 'playing', 'paused', 'failed'], to: 'stopping' },
  'process-exited': { from: ['stopping'], to: 'idle' },
  'end-of-file': { from: ['playing', 'paused'], to: 'ready' },
  'process-died': { from: ['starting', 'ready', 'playing', 'paused'], to: 'failed' },
};

export function canTransition(state: PlaybackState, event: SessionEventType): boolean {
  return EDGES[event].from.includes(state.kind);
}

/**
 * Returns the next state, or null when the event is not an edge out of `state`.
 */
export function nextState(state: PlaybackState, event: SessionEvent): PlaybackState | null {
  if (!canTransition(state, event.type)) {
    return null;
  }
  switch (event.type) {
    case 'start-failed':
    case 'process-died':
      return { kind: 'failed', reason: event.reason };
    case 'start-requested':
      return { kind: 'starting' };
    case 'channel-ready':
    case 'end-of-file':
      return { kind: 'ready' };
    case 'play':
    case 'resume':
      return { kind: 'playing' };
    case 'pause':
      return { kind: 'paused' };
    case 'stop-requested':
      return { kind: 'stopping' };
    case 'process-exited':
      return { kind: 'idle' };
  }
}

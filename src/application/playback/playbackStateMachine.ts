import type { SessionEvent } from '@/domain/playback/events';
import { nextState } from '@/domain/playback/transitions';
import {
  toSessionView,
  type OutputRoute,
  type PlaybackState,
  type SessionIdentity,
  type SessionSnapshot,
  type SessionView,
} from '@/domain/playback/types';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type SessionFieldsPatch = Partial<
  Pick<SessionSnapshot, 'currentFile' | 'position' | 'duration' | 'volume' | 'outputRoute' | 'lastError'>
>;

export type SessionChangeListener = (view: SessionView) => void;

/**
 * Owner of the session snapshot. The enumerated state only moves along the
 * transition table; continuous fields change through `update`.
 */
export class PlaybackStateMachine {
  private readonly log = createLogger('Player', 'State');
  private readonly listeners = new Set<SessionChangeListener>();
  private snapshot: SessionSnapshot;

  constructor(initial: { volume: number; outputRoute: OutputRoute }) {
    this.snapshot = {
      identity: null,
      state: { kind: 'idle' },
      currentFile: null,
      position: 0,
      duration: 0,
      volume: initial.volume,
      outputRoute: initial.outputRoute,
      lastError: null,
    };
  }

  public getSnapshot(): Readonly<SessionSnapshot> {
    return this.snapshot;
  }

  public getState(): PlaybackState {
    return this.snapshot.state;
  }

  public view(): SessionView {
    return toSessionView(this.snapshot);
  }

  /**
   * Applies one transition. Returns false, leaving the state untouched, when
   * the event is not an edge out of the current state.
   */
  public apply(event: SessionEvent): boolean {
    const from = this.snapshot.state;
    const to = nextState(from, event);
    if (!to) {
      this.log.debug('transition ignored', { from: from.kind, event: event.type });
      return false;
    }
    const next: SessionSnapshot = { ...this.snapshot, state: to };
    switch (event.type) {
      case 'start-requested':
        next.position = 0;
        next.duration = 0;
        next.lastError = null;
        break;
      case 'process-exited':
        next.identity = null;
        next.currentFile = null;
        next.position = 0;
        next.duration = 0;
        break;
      case 'start-failed':
      case 'process-died':
        next.lastError = event.reason;
        break;
      default:
        break;
    }
    this.snapshot = next;
    this.log.info('state changed', { from: from.kind, to: to.kind, event: event.type });
    this.emit();
    return true;
  }

  public update(patch: SessionFieldsPatch): void {
    let changed = false;
    const next: SessionSnapshot = { ...this.snapshot };
    if (patch.currentFile !== undefined && patch.currentFile !== next.currentFile) {
      next.currentFile = patch.currentFile;
      changed = true;
    }
    if (patch.position !== undefined && patch.position !== next.position) {
      next.position = Math.max(0, patch.position);
      changed = true;
    }
    if (patch.duration !== undefined && patch.duration !== next.duration) {
      next.duration = Math.max(0, patch.duration);
      changed = true;
    }
    if (patch.volume !== undefined && patch.volume !== next.volume) {
      next.volume = patch.volume;
      changed = true;
    }
    if (patch.outputRoute !== undefined && patch.outputRoute !== next.outputRoute) {
      next.outputRoute = patch.outputRoute;
      changed = true;
    }
    if (patch.lastError !== undefined && patch.lastError !== next.lastError) {
      next.lastError = patch.lastError;
      changed = true;
    }
    if (changed) {
      this.snapshot = next;
      this.emit();
    }
  }

  public attach(identity: SessionIdentity): void {
    this.snapshot = { ...this.snapshot, identity, currentFile: identity.mediaName };
    this.emit();
  }

  public detach(): void {
    if (!this.snapshot.identity) {
      return;
    }
    this.snapshot = { ...this.snapshot, identity: null };
    this.emit();
  }

  public onChange(listener: SessionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const view = this.view();
    for (const listener of this.listeners) {
      try {
        listener(view);
      } catch (error) {
        this.log.warn('state listener failed', { message: errorMessage(error) });
      }
    }
  }
}

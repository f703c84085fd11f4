import type { PlayerChannel, PlayerProperty } from '@/ports/PlayerChannelPort';
import type { SerialCommandQueue } from '@/application/playback/commandQueue';
import type { PlaybackStateMachine, SessionFieldsPatch } from '@/application/playback/playbackStateMachine';
import { isPlayerError } from '@/domain/playback/errors';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const POLLED_STATES = new Set(['ready', 'playing', 'paused']);

export interface PropertyPollerDeps {
  queue: SerialCommandQueue;
  machine: PlaybackStateMachine;
  channel: () => PlayerChannel | null;
  /** Transport failures are reported so the owner can count them. */
  onChannelError: (error: unknown) => void;
  onChannelSuccess: () => void;
  intervalMs?: number;
}

/**
 * Periodic refresh of position, duration and volume. A tick is skipped
 * while any caller command is queued or running, and it never changes the
 * enumerated state.
 */
export class PropertyPoller {
  private readonly log = createLogger('Player', 'Poller');
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly deps: PropertyPollerDeps) {
    this.intervalMs = deps.intervalMs ?? 1000;
  }

  public start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Runs one refresh; resolves false when the tick was skipped. */
  public async tick(): Promise<boolean> {
    const channel = this.deps.channel();
    if (!channel || !channel.isConnected() || !POLLED_STATES.has(this.deps.machine.getState().kind)) {
      return false;
    }
    const run = this.deps.queue.runIfIdle('poll', () => this.refresh(channel));
    if (!run) {
      return false;
    }
    try {
      await run;
      return true;
    } catch (error) {
      this.log.debug('poll failed', { message: errorMessage(error) });
      return false;
    }
  }

  private async refresh(channel: PlayerChannel): Promise<void> {
    const patch: SessionFieldsPatch = {};
    const position = await this.read(channel, 'time-pos');
    if (position !== null) {
      patch.position = position;
    }
    const duration = await this.read(channel, 'duration');
    if (duration !== null) {
      patch.duration = duration;
    }
    const volume = await this.read(channel, 'volume');
    if (volume !== null) {
      patch.volume = Math.round(volume);
    }
    this.deps.machine.update(patch);
  }

  private async read(channel: PlayerChannel, property: PlayerProperty): Promise<number | null> {
    try {
      const reply = await channel.send({ kind: 'get-property', property });
      this.deps.onChannelSuccess();
      return typeof reply.data === 'number' && Number.isFinite(reply.data) ? reply.data : null;
    } catch (error) {
      if (isPlayerError(error) && error.isTransient) {
        this.deps.onChannelError(error);
        throw error;
      }
      // The player answers with an error while a property is unavailable.
      this.log.spam('property unavailable', { property, message: errorMessage(error) });
      return null;
    }
  }
}

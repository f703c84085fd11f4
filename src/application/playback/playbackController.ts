import { PlayerError, isPlayerError } from '@/domain/playback/errors';
import type { PlayerEvent } from '@/domain/playback/events';
import { describeCommand, requiresActiveSession, type PlaybackCommand } from '@/domain/playback/commands';
import { isActiveState, type OutputRoute, type SessionView } from '@/domain/playback/types';
import type { PlayerCommand, PlayerProperty, PlayerReply } from '@/ports/PlayerChannelPort';
import type { SerialCommandQueue } from '@/application/playback/commandQueue';
import type { PlaybackStateMachine } from '@/application/playback/playbackStateMachine';
import type { ActiveSession, LaunchSettings, ProcessSupervisor } from '@/application/playback/processSupervisor';
import { PropertyPoller } from '@/application/playback/propertyPoller';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { delay } from '@/shared/utils/wait';

const OBSERVED_PROPERTIES: readonly PlayerProperty[] = ['time-pos', 'duration', 'volume', 'pause', 'eof-reached'];

export interface PlaybackControllerDeps {
  supervisor: ProcessSupervisor;
  machine: PlaybackStateMachine;
  queue: SerialCommandQueue;
  /** Launch settings read at every start, so config edits apply to the next session. */
  launchSettings: () => Omit<LaunchSettings, 'outputRoute' | 'volume'>;
  /** Rejects with `media-not-found` when the file to start is missing; runs inside the queued start. */
  verifyMedia: (name: string) => Promise<unknown>;
  /** Pause before `ao-reload` after a seek or skip. */
  resyncDelayMs?: number;
  pollIntervalMs?: number;
  /** Consecutive transport failures that fail the session. */
  maxChannelFailures?: number;
}

/**
 * Executes validated playback commands one at a time against the current
 * session and folds player events into the state machine.
 */
export class PlaybackController {
  private readonly log = createLogger('Player', 'Controller');
  private readonly resyncDelayMs: number;
  private readonly maxChannelFailures: number;
  private readonly poller: PropertyPoller;
  private channelFailures = 0;
  private sessionSubscriptions: Array<() => void> = [];

  constructor(private readonly deps: PlaybackControllerDeps) {
    this.resyncDelayMs = deps.resyncDelayMs ?? 100;
    this.maxChannelFailures = deps.maxChannelFailures ?? 3;
    this.poller = new PropertyPoller({
      queue: deps.queue,
      machine: deps.machine,
      channel: () => deps.supervisor.current()?.channel ?? null,
      onChannelError: (error) => this.recordChannelFailure(error),
      onChannelSuccess: () => {
        this.channelFailures = 0;
      },
      intervalMs: deps.pollIntervalMs,
    });
  }

  public start(): void {
    this.poller.start();
  }

  public getStatus(): SessionView {
    return this.deps.machine.view();
  }

  public onStatusChange(listener: (view: SessionView) => void): () => void {
    return this.deps.machine.onChange(listener);
  }

  public isRunning(): boolean {
    return this.deps.supervisor.isRunning();
  }

  /** Runs one poller tick outside the timer. */
  public pollOnce(): Promise<boolean> {
    return this.poller.tick();
  }

  public dispatch(command: PlaybackCommand): Promise<SessionView> {
    return this.deps.queue.enqueue(command.kind, async () => {
      this.log.debug('executing command', describeCommand(command));
      await this.execute(command);
      return this.deps.machine.view();
    });
  }

  /** Stops the poller and the player; used on shutdown. */
  public async shutdown(): Promise<void> {
    this.poller.stop();
    await this.dispatch({ kind: 'stop' });
  }

  private async execute(command: PlaybackCommand): Promise<void> {
    const { machine } = this.deps;
    if (requiresActiveSession(command) && !isActiveState(machine.getState())) {
      throw new PlayerError('no-active-session', `cannot ${command.kind} while ${machine.getState().kind}`, {
        command: command.kind,
        state: machine.getState().kind,
      });
    }
    switch (command.kind) {
      case 'start':
        await this.deps.verifyMedia(command.name);
        await this.startSession(command.name, command.path);
        return;
      case 'stop':
        await this.stopSession();
        return;
      case 'pause':
        await this.setPaused(true);
        return;
      case 'resume':
        await this.setPaused(false);
        return;
      case 'toggle-pause':
        await this.setPaused(machine.getState().kind === 'playing');
        return;
      case 'seek':
        await this.send({ kind: 'seek', seconds: command.seconds, mode: 'absolute' });
        await this.resyncAudio();
        await this.refreshPosition(command.seconds);
        return;
      case 'skip': {
        if (command.delta === 0) {
          return;
        }
        const target = Math.max(0, machine.getSnapshot().position + command.delta);
        await this.send({ kind: 'seek', seconds: command.delta, mode: 'relative' });
        await this.resyncAudio();
        await this.refreshPosition(target);
        return;
      }
      case 'volume':
        await this.send({ kind: 'set-property', property: 'volume', value: command.level });
        machine.update({ volume: command.level });
        return;
      case 'output-route':
        await this.changeOutputRoute(command.route);
        return;
    }
  }

  private async startSession(name: string, mediaPath: string): Promise<void> {
    const { machine, supervisor } = this.deps;
    this.releaseSession();
    const snapshot = machine.getSnapshot();
    const session = await supervisor.start(
      { name, path: mediaPath },
      { ...this.deps.launchSettings(), volume: snapshot.volume, outputRoute: snapshot.outputRoute },
    );
    this.channelFailures = 0;
    this.bindSession(session);
    await session.channel.observe(OBSERVED_PROPERTIES);
    machine.apply({ type: 'play' });
  }

  private async stopSession(): Promise<void> {
    this.releaseSession();
    await this.deps.supervisor.stop(true);
  }

  private async setPaused(paused: boolean): Promise<void> {
    const { machine } = this.deps;
    const current = machine.getState().kind;
    if ((paused && current === 'paused') || (!paused && current === 'playing')) {
      return;
    }
    await this.send({ kind: 'set-property', property: 'pause', value: paused });
    machine.apply({ type: paused ? 'pause' : 'resume' });
  }

  private async resyncAudio(): Promise<void> {
    await delay(this.resyncDelayMs);
    await this.send({ kind: 'resync-audio' });
  }

  private async refreshPosition(fallback: number): Promise<void> {
    const reply = await bestEffort(() => this.send({ kind: 'get-property', property: 'time-pos' }), {
      fallback: { data: null },
      onError: 'debug',
      log: this.log,
      label: 'position refresh failed',
    });
    const position = typeof reply.data === 'number' ? reply.data : fallback;
    this.deps.machine.update({ position });
  }

  /**
   * The connector is fixed at spawn, so an active session is restarted on the
   * new route and returned to its previous position.
   */
  private async changeOutputRoute(route: OutputRoute): Promise<void> {
    const { machine } = this.deps;
    const snapshot = machine.getSnapshot();
    machine.update({ outputRoute: route });
    const identity = snapshot.identity;
    if (!identity || !isActiveState(snapshot.state) || snapshot.outputRoute === route) {
      return;
    }
    const position = snapshot.position;
    const wasPaused = snapshot.state.kind === 'paused';
    this.log.info('restarting player on new output', { route, position });
    await this.stopSession();
    await this.startSession(identity.mediaName, identity.mediaPath);
    if (position > 0) {
      await this.send({ kind: 'seek', seconds: position, mode: 'absolute' });
      await this.resyncAudio();
      await this.refreshPosition(position);
    }
    if (wasPaused) {
      await this.setPaused(true);
    }
  }

  private async send(command: PlayerCommand): Promise<PlayerReply> {
    const session = this.deps.supervisor.current();
    if (!session) {
      throw new PlayerError('no-active-session', 'no player is running', { command: command.kind });
    }
    try {
      const reply = await session.channel.send(command);
      this.channelFailures = 0;
      return reply;
    } catch (error) {
      if (isPlayerError(error) && error.isTransient) {
        this.recordChannelFailure(error);
      }
      throw error;
    }
  }

  private bindSession(session: ActiveSession): void {
    const { channel } = session;
    this.sessionSubscriptions.push(
      channel.onEvent((event) => this.handlePlayerEvent(event)),
      channel.onClose((reason) => {
        if (this.deps.supervisor.current() !== session) {
          return;
        }
        this.recordChannelFailure(new PlayerError('channel-closed', reason));
        void this.reconnect(session);
      }),
    );
  }

  private releaseSession(): void {
    for (const unsubscribe of this.sessionSubscriptions) {
      unsubscribe();
    }
    this.sessionSubscriptions = [];
  }

  private isCurrent(session: ActiveSession): boolean {
    return session.process.isAlive() && this.deps.supervisor.current() === session;
  }

  private async reconnect(session: ActiveSession): Promise<void> {
    if (!this.isCurrent(session)) {
      return;
    }
    try {
      await session.channel.connect();
      this.log.info('control channel reconnected', { sessionId: session.identity.sessionId });
    } catch (error) {
      // The process exit already recorded why the session ended.
      if (!this.isCurrent(session)) {
        this.log.debug('reconnect ended with the session', { message: errorMessage(error) });
        return;
      }
      this.recordChannelFailure(error);
    }
  }

  private handlePlayerEvent(event: PlayerEvent): void {
    const { machine } = this.deps;
    switch (event.type) {
      case 'position':
        machine.update({ position: event.seconds });
        return;
      case 'duration':
        machine.update({ duration: event.seconds });
        return;
      case 'volume':
        machine.update({ volume: event.level });
        return;
      case 'pause-flag': {
        const kind = machine.getState().kind;
        if (event.paused && kind === 'playing') {
          machine.apply({ type: 'pause' });
        } else if (!event.paused && kind === 'paused') {
          machine.apply({ type: 'resume' });
        }
        return;
      }
      case 'end-of-file':
        machine.apply({ type: 'end-of-file' });
        return;
      case 'file-loaded':
      case 'shutdown':
        this.log.debug('player event', { type: event.type });
        return;
    }
  }

  private recordChannelFailure(error: unknown): void {
    this.channelFailures += 1;
    const message = errorMessage(error);
    this.deps.machine.update({ lastError: message });
    this.log.warn('control channel failure', { failures: this.channelFailures, message });
    if (this.channelFailures >= this.maxChannelFailures) {
      this.channelFailures = 0;
      this.releaseSession();
      this.deps.supervisor.abandon(`control channel failed ${this.maxChannelFailures} times: ${message}`);
    }
  }
}

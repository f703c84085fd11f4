import { randomUUID } from 'node:crypto';
import os from 'node:os';
import path from 'node:path';
import { isPlayerError, PlayerError } from '@/domain/playback/errors';
import type { OutputRoute, SessionIdentity } from '@/domain/playback/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { PlayerChannel, PlayerChannelFactory } from '@/ports/PlayerChannelPort';
import type { PlayerLauncher, PlayerProcess, ProcessExit } from '@/ports/PlayerProcessPort';
import type { PlaybackStateMachine } from '@/application/playback/playbackStateMachine';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { ensureDir, removeIfExists } from '@/shared/utils/file';

export interface LaunchSettings {
  volume: number;
  outputRoute: OutputRoute;
  loop: boolean;
  hardwareAccel: boolean;
  audioInHeadless: boolean;
}

export interface SupervisorTimings {
  /** Wait for the player to honour `quit`. */
  quitTimeoutMs: number;
  /** Wait between SIGTERM and SIGKILL. */
  termGraceMs: number;
  /** Liveness probe period; 0 disables the probe. */
  probeIntervalMs: number;
}

export const DEFAULT_SUPERVISOR_TIMINGS: SupervisorTimings = {
  quitTimeoutMs: 5000,
  termGraceMs: 1000,
  probeIntervalMs: 1000,
};

export interface ProcessSupervisorDeps {
  launcher: PlayerLauncher;
  channelFactory: PlayerChannelFactory;
  machine: PlaybackStateMachine;
  clock: ClockPort;
  /** Directory for per-session control sockets. */
  runtimeDir?: string;
  timings?: Partial<SupervisorTimings>;
}

/** One running player process and its control channel. */
export interface ActiveSession {
  readonly identity: SessionIdentity;
  readonly process: PlayerProcess;
  readonly channel: PlayerChannel;
}

interface SessionRecord extends ActiveSession {
  stopping: boolean;
  dead: boolean;
  unsubscribeExit: () => void;
}

let socketSequence = 0;

/**
 * Owns the lifetime of the single player process: spawn, liveness and
 * teardown. Process-level state edges are applied here and nowhere else.
 */
export class ProcessSupervisor {
  private readonly log = createLogger('Player', 'Supervisor');
  private readonly timings: SupervisorTimings;
  private readonly runtimeDir: string;
  private session: SessionRecord | null = null;
  private probeTimer: NodeJS.Timeout | null = null;

  constructor(private readonly deps: ProcessSupervisorDeps) {
    this.timings = { ...DEFAULT_SUPERVISOR_TIMINGS, ...deps.timings };
    this.runtimeDir = deps.runtimeDir ?? os.tmpdir();
  }

  public current(): ActiveSession | null {
    return this.session;
  }

  public isRunning(): boolean {
    return this.session !== null && this.session.process.isAlive();
  }

  /**
   * Replaces any running session with a new player on `mediaPath`. Resolves
   * once the control channel is connected and the state is `ready`.
   */
  public async start(media: { name: string; path: string }, settings: LaunchSettings): Promise<ActiveSession> {
    if (this.session) {
      await this.stop(true);
    }
    const { machine } = this.deps;
    machine.apply({ type: 'start-requested' });

    const socketPath = this.nextSocketPath();
    await ensureDir(this.runtimeDir);
    await removeIfExists(socketPath);

    let child: PlayerProcess;
    try {
      child = await this.deps.launcher.launch({ mediaPath: media.path, socketPath, ...settings });
    } catch (error) {
      const failure = isPlayerError(error)
        ? error
        : new PlayerError('spawn-error', `failed to start player: ${errorMessage(error)}`, {
            reason: errorMessage(error),
          });
      machine.apply({ type: 'start-failed', reason: failure.message });
      throw failure;
    }

    const identity: SessionIdentity = {
      sessionId: randomUUID(),
      pid: child.pid,
      socketPath,
      createdAt: this.deps.clock.now(),
      mediaName: media.name,
      mediaPath: media.path,
    };
    const session: SessionRecord = {
      identity,
      process: child,
      channel: this.deps.channelFactory(socketPath),
      stopping: false,
      dead: false,
      unsubscribeExit: () => undefined,
    };
    this.session = session;
    machine.attach(identity);
    session.unsubscribeExit = child.onExit((exit) => this.handleExit(session, exit));
    this.startProbe();

    try {
      await session.channel.connect();
    } catch (error) {
      if (!session.dead) {
        this.session = null;
        this.stopProbe();
        await this.teardown(session, false);
        machine.detach();
        machine.apply({ type: 'start-failed', reason: errorMessage(error) });
      }
      throw error;
    }

    machine.apply({ type: 'channel-ready' });
    this.log.info('session started', {
      sessionId: identity.sessionId,
      pid: identity.pid,
      media: media.name,
    });
    return session;
  }

  /**
   * Stops the running session. Without a session this is a no-op, except
   * that a failed state is cleared back to idle.
   */
  public async stop(graceful = true): Promise<void> {
    const { machine } = this.deps;
    const session = this.session;
    if (!session) {
      if (machine.getState().kind === 'failed') {
        machine.apply({ type: 'stop-requested' });
        machine.apply({ type: 'process-exited' });
      }
      return;
    }
    machine.apply({ type: 'stop-requested' });
    this.session = null;
    this.stopProbe();
    await this.teardown(session, graceful);
    machine.detach();
    machine.apply({ type: 'process-exited' });
    this.log.info('session stopped', { sessionId: session.identity.sessionId });
  }

  /**
   * Gives up on a session whose control channel stopped answering: the
   * process is killed in the background and the state becomes `failed`.
   */
  public abandon(reason: string): void {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    this.stopProbe();
    session.dead = true;
    const { machine } = this.deps;
    machine.apply({ type: 'process-died', reason });
    machine.detach();
    this.log.warn('session abandoned', { sessionId: session.identity.sessionId, reason });
    void bestEffort(() => this.teardown(session, false), {
      fallback: undefined,
      onError: 'warn',
      log: this.log,
      label: 'teardown of abandoned session failed',
    });
  }

  private async teardown(session: SessionRecord, graceful: boolean): Promise<void> {
    session.stopping = true;
    session.unsubscribeExit();
    const { process: child, channel } = session;

    if (graceful && child.isAlive() && channel.isConnected()) {
      await bestEffort(() => channel.send({ kind: 'quit' }), {
        fallback: null,
        onError: 'debug',
        log: this.log,
        label: 'quit request failed',
      });
      await child.waitForExit(this.timings.quitTimeoutMs);
    }
    if (child.isAlive()) {
      this.log.debug('terminating player', { pid: child.pid });
      child.kill('SIGTERM');
      if (!(await child.waitForExit(this.timings.termGraceMs))) {
        this.log.warn('player ignored SIGTERM, killing', { pid: child.pid });
        child.kill('SIGKILL');
        await child.waitForExit(this.timings.termGraceMs);
      }
    }
    await channel.close();
    await this.removeSocket(session.identity.socketPath);
  }

  private handleExit(session: SessionRecord, exit: ProcessExit | null): void {
    if (session.stopping || session.dead) {
      return;
    }
    session.dead = true;
    if (this.session === session) {
      this.session = null;
    }
    this.stopProbe();

    const how = exit?.signal ? `signal ${exit.signal}` : `code ${exit?.code ?? 'unknown'}`;
    const diagnostic = session.process.lastDiagnostic();
    const detail = diagnostic ? `player exited with ${how}: ${diagnostic}` : `player exited with ${how}`;
    this.log.warn('player exited unexpectedly', { pid: session.identity.pid, detail });

    const { machine } = this.deps;
    machine.apply({ type: 'process-died', reason: 'process exited' });
    machine.update({ lastError: detail });
    machine.detach();
    void this.releaseDeadSession(session);
  }

  private async releaseDeadSession(session: SessionRecord): Promise<void> {
    await bestEffort(() => session.channel.close(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'channel close failed',
    });
    await this.removeSocket(session.identity.socketPath);
  }

  private async removeSocket(socketPath: string): Promise<void> {
    await bestEffort(() => removeIfExists(socketPath), {
      fallback: false,
      onError: 'debug',
      log: this.log,
      label: 'socket cleanup failed',
      context: { socketPath },
    });
  }

  private startProbe(): void {
    this.stopProbe();
    if (this.timings.probeIntervalMs <= 0) {
      return;
    }
    this.probeTimer = setInterval(() => {
      const session = this.session;
      if (session && !session.process.isAlive()) {
        this.handleExit(session, null);
      }
    }, this.timings.probeIntervalMs);
    this.probeTimer.unref();
  }

  private stopProbe(): void {
    if (this.probeTimer) {
      clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
  }

  private nextSocketPath(): string {
    socketSequence += 1;
    return path.join(this.runtimeDir, `headless-player-${process.pid}-${socketSequence}.sock`);
  }
}

import net from 'node:net';
import { EventEmitter } from 'node:events';
import type { LaunchSpec, PlayerLauncher, PlayerProcess, ProcessExit } from '../../src/ports/PlayerProcessPort';
import { PlayerError } from '../../src/domain/playback/errors';
import { isRecord } from '../../src/shared/utils/guards';

type Json = string | number | boolean | null;

export type FakeMpvOptions = {
  /** Commands (by mpv name) answered with an error instead of success. */
  failing?: Set<string>;
  /** Commands (by mpv name) that never get a reply. */
  unanswered?: Set<string>;
};

/**
 * In-process stand-in for mpv's JSON IPC server. Keeps a tiny player model so
 * property reads reflect earlier seeks and sets.
 */
export class FakeMpvServer {
  public readonly commands: Json[][] = [];
  public position = 0;
  public duration = 120;
  public volume = 100;
  public paused = false;
  private readonly server = net.createServer((socket) => this.accept(socket));
  private readonly sockets = new Set<net.Socket>();
  private readonly observed = new Map<string, number>();
  private readonly events = new EventEmitter();

  constructor(
    public readonly socketPath: string,
    private readonly options: FakeMpvOptions = {},
  ) {}

  public listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.socketPath, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
  }

  public commandNames(): string[] {
    return this.commands.map((command) => String(command[0]));
  }

  public onQuit(listener: () => void): void {
    this.events.on('quit', listener);
  }

  /** Pushes a raw event line to every connected client. */
  public push(message: Record<string, Json>): void {
    const line = `${JSON.stringify(message)}\n`;
    for (const socket of this.sockets) {
      socket.write(line);
    }
  }

  /** Drops client connections without stopping the listener. */
  public dropClients(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
  }

  public close(): Promise<void> {
    this.dropClients();
    return new Promise((resolve) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(() => resolve());
    });
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');
    let buffer = '';
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      let idx = buffer.indexOf('\n');
      while (idx >= 0) {
        const line = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 1);
        this.handle(socket, line);
        idx = buffer.indexOf('\n');
      }
    });
    socket.on('error', () => undefined);
    socket.on('close', () => this.sockets.delete(socket));
  }

  private handle(socket: net.Socket, line: string): void {
    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed) || !Array.isArray(parsed.command) || typeof parsed.request_id !== 'number') {
      return;
    }
    const command: Json[] = parsed.command.filter(isJson);
    const requestId = parsed.request_id;
    const name = String(command[0]);
    this.commands.push(command);
    if (this.options.unanswered?.has(name)) {
      return;
    }
    if (this.options.failing?.has(name)) {
      socket.write(`${JSON.stringify({ request_id: requestId, error: 'property unavailable', data: null })}\n`);
      return;
    }
    const data = this.execute(command);
    socket.write(`${JSON.stringify({ request_id: requestId, error: 'success', data })}\n`);
    if (name === 'quit') {
      this.events.emit('quit');
    }
  }

  private execute(command: Json[]): Json {
    const [name, first, second] = command;
    switch (name) {
      case 'get_property':
        return this.read(String(first));
      case 'set_property':
        if (first === 'pause' && typeof second === 'boolean') {
          this.paused = second;
          this.notify('pause', second);
        } else if (first === 'volume' && typeof second === 'number') {
          this.volume = second;
          this.notify('volume', second);
        }
        return null;
      case 'seek':
        if (typeof first === 'number') {
          this.position = second === 'relative' ? Math.max(0, this.position + first) : first;
        }
        return null;
      case 'observe_property':
        if (typeof first === 'number' && typeof second === 'string') {
          this.observed.set(second, first);
        }
        return null;
      default:
        return null;
    }
  }

  private read(property: string): Json {
    switch (property) {
      case 'time-pos':
        return this.position;
      case 'duration':
        return this.duration;
      case 'volume':
        return this.volume;
      case 'pause':
        return this.paused;
      case 'eof-reached':
        return false;
      default:
        return null;
    }
  }

  private notify(property: string, data: Json): void {
    const id = this.observed.get(property);
    if (id !== undefined) {
      this.push({ event: 'property-change', id, name: property, data });
    }
  }
}

function isJson(value: unknown): value is Json {
  return (
    value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
  );
}

let nextPid = 4000;

export class FakePlayerProcess implements PlayerProcess {
  public readonly pid: number;
  public readonly signals: NodeJS.Signals[] = [];
  public diagnostic: string | null = null;
  /** When true SIGTERM is recorded but ignored. */
  public ignoreSigterm = false;
  private exit: ProcessExit | null = null;
  private readonly events = new EventEmitter();

  constructor() {
    nextPid += 1;
    this.pid = nextPid;
  }

  public isAlive(): boolean {
    return this.exit === null;
  }

  public onExit(listener: (exit: ProcessExit) => void): () => void {
    const exit = this.exit;
    if (exit) {
      listener(exit);
      return () => undefined;
    }
    this.events.on('exit', listener);
    return () => this.events.off('exit', listener);
  }

  public kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (!this.isAlive()) {
      return false;
    }
    if (signal === 'SIGTERM' && this.ignoreSigterm) {
      return true;
    }
    this.terminate(null, signal);
    return true;
  }

  public async waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) {
      return true;
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.events.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.events.once('exit', onExit);
    });
  }

  public lastDiagnostic(): string | null {
    return this.diagnostic;
  }

  /** Marks the process gone without ever emitting `exit`. */
  public vanish(): void {
    this.exit = { code: null, signal: null };
  }

  /** Simulates the process ending on its own. */
  public terminate(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exit) {
      return;
    }
    this.exit = { code, signal };
    this.events.emit('exit', this.exit);
  }
}

export type FakeLaunch = {
  spec: LaunchSpec;
  process: FakePlayerProcess;
  server: FakeMpvServer;
};

export type FakeLauncherOptions = FakeMpvOptions & {
  /** Fail every launch with a spawn error. */
  spawnFails?: boolean;
  /** Start the process but never create the control socket. */
  withoutSocket?: boolean;
};

/**
 * Launcher whose "processes" are fake mpv servers listening on the requested
 * socket path. `quit` ends the process, and process exit closes the server.
 */
export class FakeLauncher implements PlayerLauncher {
  public readonly launches: FakeLaunch[] = [];

  constructor(public options: FakeLauncherOptions = {}) {}

  public get last(): FakeLaunch {
    const launch = this.launches[this.launches.length - 1];
    if (!launch) {
      throw new Error('no player launched');
    }
    return launch;
  }

  public async launch(spec: LaunchSpec): Promise<PlayerProcess> {
    if (this.options.spawnFails) {
      throw new PlayerError('spawn-error', 'failed to start mpv: not found', { reason: 'ENOENT' });
    }
    const process = new FakePlayerProcess();
    const server = new FakeMpvServer(spec.socketPath, this.options);
    if (!this.options.withoutSocket) {
      await server.listen();
    }
    server.onQuit(() => {
      setImmediate(() => process.terminate(0));
    });
    process.onExit(() => {
      void server.close();
    });
    this.launches.push({ spec, process, server });
    return process;
  }

  public async closeAll(): Promise<void> {
    for (const launch of this.launches) {
      launch.process.terminate(0);
      await launch.server.close();
    }
  }
}

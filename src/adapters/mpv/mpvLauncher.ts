import { spawn, type ChildProcess } from 'node:child_process';
import { PlayerError } from '@/domain/playback/errors';
import type { LaunchSpec, PlayerLauncher, PlayerProcess, ProcessExit } from '@/ports/PlayerProcessPort';
import { buildMpvArgs } from '@/adapters/mpv/mpvArgs';
import { detectHdmiAudioDevice, type AudioDeviceDetector } from '@/adapters/audio/hdmiAudioDetector';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Player', 'Launcher');

export type MpvLauncherOptions = {
  mpvPath?: string;
  detectAudioDevice?: AudioDeviceDetector;
};

/**
 * Wraps a spawned mpv child; stdout is discarded, stderr is kept as the last
 * non-empty line for failure reports. Exit is taken from `close`, after stderr
 * has drained, so the diagnostic is complete when listeners run.
 */
class ChildPlayerProcess implements PlayerProcess {
  private exit: ProcessExit | null = null;
  private lastStderrLine: string | null = null;

  constructor(private readonly child: ChildProcess) {
    child.once('close', (code, signal) => {
      this.exit = { code, signal };
      log.debug('player exited', { pid: child.pid, code, signal });
    });
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      const lines = chunk.split('\n').map((line) => line.trim()).filter(Boolean);
      const last = lines[lines.length - 1];
      if (last) {
        this.lastStderrLine = last;
        log.debug(`[mpv:${child.pid ?? '?'}] ${last}`);
      }
    });
  }

  public get pid(): number | null {
    return this.child.pid ?? null;
  }

  public isAlive(): boolean {
    return this.exit === null;
  }

  public onExit(listener: (exit: ProcessExit) => void): () => void {
    if (this.exit) {
      listener(this.exit);
      return () => undefined;
    }
    const handler = (code: number | null, signal: NodeJS.Signals | null) => listener({ code, signal });
    this.child.once('close', handler);
    return () => {
      this.child.off('close', handler);
    };
  }

  public kill(signal: NodeJS.Signals): boolean {
    if (this.exit) {
      return false;
    }
    return this.child.kill(signal);
  }

  public waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exit) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(false);
      }, timeoutMs);
      timer.unref();
      const unsubscribe = this.onExit(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  public lastDiagnostic(): string | null {
    return this.lastStderrLine;
  }
}

export class MpvLauncher implements PlayerLauncher {
  private readonly mpvPath: string;
  private readonly detectAudioDevice: AudioDeviceDetector;

  constructor(options: MpvLauncherOptions = {}) {
    this.mpvPath = options.mpvPath ?? 'mpv';
    this.detectAudioDevice = options.detectAudioDevice ?? detectHdmiAudioDevice;
  }

  public async launch(spec: LaunchSpec): Promise<PlayerProcess> {
    const audioDevice = spec.audioInHeadless ? await this.detectAudioDevice() : null;
    const args = buildMpvArgs(spec, { audioDevice });
    log.info('starting player', { mpvPath: this.mpvPath, media: spec.mediaPath, route: spec.outputRoute });
    log.debug('player arguments', { args: args.join(' ') });

    const child = spawn(this.mpvPath, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: false,
    });
    const handle = new ChildPlayerProcess(child);

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(
          new PlayerError('spawn-error', `failed to start ${this.mpvPath}: ${error.message}`, {
            mpvPath: this.mpvPath,
            reason: error.message,
          }),
        );
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    child.on('error', (error) => {
      log.warn('player process error', { pid: child.pid, message: error.message });
    });
    log.info('player started', { pid: child.pid });
    return handle;
  }
}

import { loadConfig } from '@/config';
import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { createLogger, logManager, parseLogLevel } from '@/shared/logging/logger';
import { HttpService } from '@/adapters/http/httpService';
import { MpvLauncher } from '@/adapters/mpv/mpvLauncher';
import { createMpvChannelFactory } from '@/adapters/mpv/mpvIpcChannel';
import { MusicMetadataProbe } from '@/adapters/media/musicMetadataProbe';
import { MediaLibrary } from '@/application/media/mediaLibrary';
import { TransferPipeline } from '@/application/media/transferPipeline';
import { SerialCommandQueue } from '@/application/playback/commandQueue';
import { PlaybackController } from '@/application/playback/playbackController';
import { PlaybackStateMachine } from '@/application/playback/playbackStateMachine';
import { ProcessSupervisor, type SupervisorTimings } from '@/application/playback/processSupervisor';
import { PlayerService } from '@/application/player/playerService';
import type { ClockPort } from '@/ports/ClockPort';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import type { PlayerChannelFactory } from '@/ports/PlayerChannelPort';
import type { PlayerLauncher } from '@/ports/PlayerProcessPort';
import { createRuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
  timeoutMs: number;
};

/** Replaceable collaborators; tests swap in fakes for the player process. */
export type RuntimeOverrides = {
  env?: Partial<EnvironmentConfig>;
  launcher?: PlayerLauncher;
  channelFactory?: PlayerChannelFactory;
  probe?: MediaProbePort | null;
  clock?: ClockPort;
  /** Listen port, overriding the stored config (0 picks a free port). */
  httpPort?: number;
  timings?: Partial<SupervisorTimings>;
  pollIntervalMs?: number;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** The player facade once started. */
  player: () => PlayerService | null;
  http: () => HttpService | null;
};

/** Covers the graceful quit wait plus the SIGTERM grace of the player. */
const PLAYER_STOP_TIMEOUT_MS = 8000;
const HTTP_STOP_TIMEOUT_MS = 3000;

export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
  const env: EnvironmentConfig = { ...loadEnvironment(), ...overrides.env };
  const ports = createRuntimePorts({ configPath: env.configPath, clock: overrides.clock });
  const configPort = ports.config;

  let httpService: HttpService | null = null;
  let playerService: PlayerService | null = null;
  let controller: PlaybackController | null = null;

  async function startServices(): Promise<void> {
    const storedConfig = await configPort.load();
    logManager.configure({ level: parseLogLevel(storedConfig.logLevel) });
    const log = createLogger('Server');
    const config = loadConfig(storedConfig, env);

    log.info('bootstrapping player', {
      env: config.env.nodeEnv,
      configPath: config.env.configPath,
      mediaDir: storedConfig.mediaDir,
    });

    const library = new MediaLibrary(() => configPort.getConfig().mediaDir);
    await library.init();
    const transfers = new TransferPipeline({
      library,
      maxUploadSize: () => configPort.getConfig().maxUploadSize,
      clock: ports.clock,
      probe: overrides.probe === null ? undefined : (overrides.probe ?? new MusicMetadataProbe()),
    });
    await transfers.purgeStale();

    const machine = new PlaybackStateMachine({
      volume: storedConfig.volume,
      outputRoute: storedConfig.hdmiOutput,
    });
    const supervisor = new ProcessSupervisor({
      launcher: overrides.launcher ?? new MpvLauncher({ mpvPath: storedConfig.mpvPath }),
      channelFactory: overrides.channelFactory ?? createMpvChannelFactory(),
      machine,
      clock: ports.clock,
      runtimeDir: config.env.runtimeDir,
      timings: overrides.timings,
    });
    controller = new PlaybackController({
      supervisor,
      machine,
      queue: new SerialCommandQueue(),
      launchSettings: () => {
        const current = configPort.getConfig();
        return {
          loop: current.loop,
          hardwareAccel: current.hardwareAccel,
          audioInHeadless: current.audioInHeadless,
        };
      },
      verifyMedia: (name) => library.resolveExisting(name),
      pollIntervalMs: overrides.pollIntervalMs,
    });
    playerService = new PlayerService({
      controller,
      library,
      transfers,
      config: configPort,
      clock: ports.clock,
    });

    httpService = new HttpService(
      { ...config.http, port: overrides.httpPort ?? config.http.port },
      { player: playerService, configPort },
    );
    controller.start();
    await httpService.start();

    log.info('startup complete');
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    const services: LifecycleService[] = [];
    const http = httpService;
    const playback = controller;
    if (http) {
      services.push({ name: 'http', stop: () => http.stop(), timeoutMs: HTTP_STOP_TIMEOUT_MS });
    }
    if (playback) {
      services.push({ name: 'player', stop: () => playback.shutdown(), timeoutMs: PLAYER_STOP_TIMEOUT_MS });
    }

    await Promise.all(
      services.map((service) => stopWithTimeout(service.name, service.stop, service.timeoutMs, log)),
    );

    httpService = null;
    playerService = null;
    controller = null;
  }

  return {
    start: startServices,
    stop: stopServices,
    player: () => playerService,
    http: () => httpService,
  };
}

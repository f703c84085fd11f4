import path from 'node:path';
import type { StoragePort } from '@/ports/StoragePort';
import type { PlayerConfig } from '@/domain/config/types';
import { validationError } from '@/domain/playback/errors';
import { OUTPUT_ROUTES } from '@/domain/playback/types';
import { validateOutputRoute, validateVolume, VOLUME_MAX, VOLUME_MIN } from '@/domain/media/validation';
import { LOG_LEVELS } from '@/types/logLevel';
import { parseLogLevel } from '@/shared/logging/logger';
import { isRecord } from '@/shared/utils/guards';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'data', 'config.json');
export const DEFAULT_MAX_UPLOAD_SIZE = 2 * 1024 * 1024 * 1024;

/**
 * Configuration store backed by a single JSON file on disk.
 */
export class ConfigRepository {
  private config: PlayerConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    public readonly configPath: string = DEFAULT_CONFIG_PATH,
  ) {}

  public async load(): Promise<PlayerConfig> {
    const fallback = defaultConfig();
    const loaded = await this.storage.readJson(this.configPath, fallback, {
      writeIfMissing: true,
    });
    const { config, migrated } = normalizeConfig(loaded);
    this.config = config;
    if (migrated) {
      await this.save();
    }
    return this.config;
  }

  public get(): PlayerConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(
    mutator: (config: PlayerConfig) => void | Promise<void>,
  ): Promise<PlayerConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    const { config } = normalizeConfig(current);
    if (serializeConfig(config) !== before) {
      config.updatedAt = new Date().toISOString();
    }
    this.config = config;
    await this.save();
    return config;
  }
}

function serializeConfig(config: PlayerConfig): string {
  return JSON.stringify(config, (key, value: unknown) => (key === 'updatedAt' ? undefined : value));
}

export function defaultConfig(): PlayerConfig {
  return {
    mediaDir: path.resolve(process.cwd(), 'data', 'media'),
    maxUploadSize: DEFAULT_MAX_UPLOAD_SIZE,
    volume: 100,
    loop: false,
    hardwareAccel: true,
    hdmiOutput: 'auto',
    audioInHeadless: true,
    port: 5000,
    logLevel: 'info',
    mpvPath: 'mpv',
    updatedAt: new Date().toISOString(),
  };
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value < 65536;
}

/**
 * Merges a parsed config file over the defaults, dropping values of the wrong
 * type and accepting the snake_case keys older files were written with.
 * `migrated` is true when the result differs from what was on disk.
 */
export function normalizeConfig(raw: unknown): { config: PlayerConfig; migrated: boolean } {
  const defaults = defaultConfig();
  if (!isRecord(raw)) {
    return { config: defaults, migrated: true };
  }
  const pick = (camel: string, snake: string): unknown => (camel in raw ? raw[camel] : raw[snake]);

  const mediaDir = pick('mediaDir', 'media_dir');
  const maxUploadSize = pick('maxUploadSize', 'max_upload_size');
  const volume = raw.volume;
  const hdmiOutput = pick('hdmiOutput', 'hdmi_output');
  const port = raw.port;
  const mpvPath = raw.mpvPath;
  const loop = raw.loop;
  const hardwareAccel = pick('hardwareAccel', 'hardware_accel');
  const audioInHeadless = pick('audioInHeadless', 'audio_in_headless');

  const config: PlayerConfig = {
    mediaDir: typeof mediaDir === 'string' && mediaDir.trim() ? mediaDir : defaults.mediaDir,
    maxUploadSize:
      typeof maxUploadSize === 'number' && Number.isInteger(maxUploadSize) && maxUploadSize > 0
        ? maxUploadSize
        : defaults.maxUploadSize,
    volume:
      typeof volume === 'number' && Number.isInteger(volume) && volume >= VOLUME_MIN && volume <= VOLUME_MAX
        ? volume
        : defaults.volume,
    loop: typeof loop === 'boolean' ? loop : defaults.loop,
    hardwareAccel: typeof hardwareAccel === 'boolean' ? hardwareAccel : defaults.hardwareAccel,
    hdmiOutput: OUTPUT_ROUTES.find((route) => route === hdmiOutput) ?? defaults.hdmiOutput,
    audioInHeadless: typeof audioInHeadless === 'boolean' ? audioInHeadless : defaults.audioInHeadless,
    port: isPort(port) ? port : defaults.port,
    logLevel: parseLogLevel(pick('logLevel', 'log_level'), 'info'),
    mpvPath: typeof mpvPath === 'string' && mpvPath.trim() ? mpvPath : defaults.mpvPath,
    updatedAt: typeof raw.updatedAt === 'string' ? raw.updatedAt : defaults.updatedAt,
  };

  const migrated = JSON.stringify(config) !== JSON.stringify(raw);
  return { config, migrated };
}

/**
 * Validates a partial update from the config endpoint. Unknown keys are
 * ignored; known keys with invalid values fail the whole update.
 */
export function parseConfigPatch(input: unknown): Partial<PlayerConfig> {
  if (!isRecord(input) || Object.keys(input).length === 0) {
    throw validationError('No configuration data provided', input);
  }
  const patch: Partial<PlayerConfig> = {};
  for (const [key, value] of Object.entries(input)) {
    switch (key) {
      case 'volume':
        patch.volume = validateVolume(value);
        break;
      case 'hdmiOutput':
        patch.hdmiOutput = validateOutputRoute(value);
        break;
      case 'loop':
      case 'hardwareAccel':
      case 'audioInHeadless':
        if (typeof value !== 'boolean') {
          throw validationError(`${key} must be true or false, got ${String(value)}`, value);
        }
        patch[key] = value;
        break;
      case 'port':
        if (!isPort(value)) {
          throw validationError(`Invalid port: ${String(value)}`, value);
        }
        patch.port = value;
        break;
      case 'maxUploadSize':
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
          throw validationError(`Invalid upload limit: ${String(value)}`, value);
        }
        patch.maxUploadSize = value;
        break;
      case 'logLevel': {
        const level = parseLogLevel(value, 'none');
        if (level === 'none' && String(value).trim().toLowerCase() !== 'none') {
          throw validationError(
            `Invalid log level: ${String(value)}. Must be one of ${LOG_LEVELS.join(', ')}`,
            value,
          );
        }
        patch.logLevel = level;
        break;
      }
      case 'mediaDir':
      case 'mpvPath':
        if (typeof value !== 'string' || !value.trim()) {
          throw validationError(`${key} must be a non-empty string`, value);
        }
        patch[key] = value.trim();
        break;
      default:
        break;
    }
  }
  return patch;
}

import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG_PATH } from '@/application/config/configRepository';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  httpHost: string;
  configPath: string;
  /** Directory holding the per-session player control sockets. */
  runtimeDir: string;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  httpHost: '0.0.0.0',
  configPath: DEFAULT_CONFIG_PATH,
  runtimeDir: os.tmpdir(),
};

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    httpHost: nonEmpty(env.HTTP_HOST) ?? DEFAULT_ENVIRONMENT.httpHost,
    configPath: resolvePath(env.PLAYER_CONFIG_PATH) ?? DEFAULT_ENVIRONMENT.configPath,
    runtimeDir: resolvePath(env.PLAYER_RUNTIME_DIR) ?? DEFAULT_ENVIRONMENT.runtimeDir,
  };
}

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  switch (value?.trim().toLowerCase()) {
    case 'production':
      return 'production';
    case 'test':
      return 'test';
    default:
      return DEFAULT_ENVIRONMENT.nodeEnv;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function resolvePath(value: string | undefined): string | undefined {
  const trimmed = nonEmpty(value);
  return trimmed ? path.resolve(trimmed) : undefined;
}

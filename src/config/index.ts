import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { buildHttpServerConfig } from '@/config/http';
import type { PlayerConfig } from '@/domain/config/types';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (player: PlayerConfig, env: EnvironmentConfig = loadEnvironment()) => ({
  env,
  http: buildHttpServerConfig(env, player),
});

export type AppConfig = ReturnType<typeof loadConfig>;

import type { EnvironmentConfig } from '@/config/environment';
import type { PlayerConfig } from '@/domain/config/types';

/**
 * Runtime options for the HTTP gateway.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
}

/**
 * The listening port comes from the stored player config, the bind address
 * from the environment.
 */
export function buildHttpServerConfig(env: EnvironmentConfig, player: PlayerConfig): HttpServerConfig {
  return {
    port: player.port,
    host: env.httpHost,
  };
}

import type { PlayerConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<PlayerConfig>;
  getConfig(): PlayerConfig;
  updateConfig(mutator: (config: PlayerConfig) => void | Promise<void>): Promise<PlayerConfig>;
}

export type { PlayerConfig };

import type { PlayerConfig } from '@/domain/config/types';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { ConfigRepository } from '@/application/config/configRepository';

/**
 * File-backed `ConfigPort`; all reads after `load()` come from the repository's
 * in-memory copy.
 */
export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): Promise<PlayerConfig> {
    return this.repository.load();
  }

  public getConfig(): PlayerConfig {
    return this.repository.get();
  }

  public updateConfig(mutator: (config: PlayerConfig) => void | Promise<void>): Promise<PlayerConfig> {
    return this.repository.update(mutator);
  }
}

import type { StoragePort } from '@/ports/StoragePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { ClockPort } from '@/ports/ClockPort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { ConfigRepository } from '@/application/config/configRepository';
import { systemClock } from '@/infrastructure/time/systemClock';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
  clock: ClockPort;
};

export function createRuntimePorts(deps: { configPath: string; clock?: ClockPort }): RuntimePorts {
  const storage = new StorageAdapter();
  const configRepository = new ConfigRepository(storage, deps.configPath);
  return {
    storage,
    config: new ConfigAdapter(configRepository),
    clock: deps.clock ?? systemClock,
  };
}

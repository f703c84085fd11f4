import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

const runtime = createRuntime();

runtime
  .start()
  .then(() => registerShutdownHandlers(runtime))
  .catch((error: unknown) => {
    const log = createLogger('Server');
    log.error('fatal bootstrap error', { message: errorMessage(error) });
    process.exit(1);
  });

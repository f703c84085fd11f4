import { parseFile } from 'music-metadata';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Media', 'Probe');

/**
 * Reads the container duration with music-metadata. Only the header is
 * parsed; covers and tags are skipped.
 */
export class MusicMetadataProbe implements MediaProbePort {
  public async probeDuration(filePath: string): Promise<number | undefined> {
    const metadata = await parseFile(filePath, { duration: true, skipCovers: true });
    const duration = metadata.format.duration;
    log.debug('probed media', { filePath, duration, container: metadata.format.container });
    return typeof duration === 'number' && Number.isFinite(duration) ? duration : undefined;
  }
}

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const execFileAsync = promisify(execFile);
const log = createLogger('Audio', 'HdmiDetector');

const APLAY_TIMEOUT_MS = 5000;
export const DEFAULT_AUDIO_DEVICE = 'alsa/default';

export type AudioDeviceDetector = () => Promise<string | null>;

/**
 * Picks the first HDMI PCM name from `aplay -L` output.
 *
 * `aplay -L` prints each PCM name flush left and indents its description:
 *   hdmi:CARD=vc4hdmi0,DEV=0
 *       vc4-hdmi-0, MAI PCM i2s-hifi-0
 * Only the unindented lines are candidates.
 */
export function pickHdmiAudioDevice(output: string): string {
  for (const line of output.split('\n')) {
    if (!line.trim() || /^\s/.test(line)) {
      continue;
    }
    if (line.toLowerCase().includes('hdmi')) {
      return `alsa/${line.trim()}`;
    }
  }
  return DEFAULT_AUDIO_DEVICE;
}

/**
 * Lists ALSA playback PCMs and returns the HDMI one, `alsa/default` when none
 * is listed, or null when aplay itself cannot be run.
 */
export async function detectHdmiAudioDevice(): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('aplay', ['-L'], { timeout: APLAY_TIMEOUT_MS });
    const device = pickHdmiAudioDevice(stdout);
    log.debug('audio device selected', { device });
    return device;
  } catch (error) {
    log.warn('could not detect HDMI audio device', { message: errorMessage(error) });
    return null;
  }
}

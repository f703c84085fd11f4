import type { LaunchSpec } from '@/ports/PlayerProcessPort';

export type MpvArgOptions = {
  /** Resolved ALSA device (`alsa/...`); omitted when null. */
  audioDevice?: string | null;
};

/**
 * Command line for a headless mpv bound to a DRM connector with its JSON
 * IPC server on `spec.socketPath`. The media path is always last.
 */
export function buildMpvArgs(spec: LaunchSpec, options: MpvArgOptions = {}): string[] {
  const args = [
    '--no-terminal',
    '--really-quiet',
    `--input-ipc-server=${spec.socketPath}`,
    '--idle=yes',
    '--force-window=no',
    '--keep-open=yes',
    '--no-osc',
    '--osd-level=0',
    `--volume=${spec.volume}`,
    '--vo=gpu',
    '--gpu-context=drm',
  ];
  if (spec.outputRoute !== 'auto') {
    args.push(`--drm-connector=${spec.outputRoute}`);
  }
  if (spec.hardwareAccel) {
    args.push('--hwdec=auto', '--hwdec-codecs=all');
  }
  if (spec.audioInHeadless && options.audioDevice) {
    args.push(`--audio-device=${options.audioDevice}`);
  }
  if (spec.loop) {
    args.push('--loop-file=inf');
  }
  // Keeps 4K-capable panels at broadcast levels and paced to the display.
  args.push('--video-output-levels=limited', '--video-sync=display-resample');
  args.push('--', spec.mediaPath);
  return args;
}

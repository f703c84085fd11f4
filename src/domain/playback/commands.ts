import {
  resolveMediaName,
  validateOutputRoute,
  validateSeekPosition,
  validateSkipDelta,
  validateVolume,
} from '@/domain/media/validation';
import type { OutputRoute } from '@/domain/playback/types';

/** Raw caller input, before any checks. */
export type CommandRequest =
  | { kind: 'start'; filename: unknown }
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'toggle-pause' }
  | { kind: 'stop' }
  | { kind: 'seek'; seconds: unknown }
  | { kind: 'skip'; delta: unknown }
  | { kind: 'volume'; level: unknown }
  | { kind: 'output-route'; route: unknown };

/** A request that passed validation and was normalized for dispatch. */
export type PlaybackCommand =
  | { kind: 'start'; name: string; path: string }
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'toggle-pause' }
  | { kind: 'stop' }
  | { kind: 'seek'; seconds: number }
  | { kind: 'skip'; delta: number }
  | { kind: 'volume'; level: number }
  | { kind: 'output-route'; route: OutputRoute };

export interface CommandContext {
  mediaDir: string;
}

/**
 * The only way to obtain a `PlaybackCommand`: throws a `PlayerError` for any
 * input that fails its bounds, so an invalid request never reaches dispatch.
 */
export function createCommand(request: CommandRequest, context: CommandContext): PlaybackCommand {
  switch (request.kind) {
    case 'start': {
      const resolved = resolveMediaName(request.filename, context.mediaDir);
      return { kind: 'start', name: resolved.name, path: resolved.absolutePath };
    }
    case 'seek':
      return { kind: 'seek', seconds: validateSeekPosition(request.seconds) };
    case 'skip':
      return { kind: 'skip', delta: validateSkipDelta(request.delta) };
    case 'volume':
      return { kind: 'volume', level: validateVolume(request.level) };
    case 'output-route':
      return { kind: 'output-route', route: validateOutputRoute(request.route) };
    case 'pause':
    case 'resume':
    case 'toggle-pause':
    case 'stop':
      return { kind: request.kind };
  }
}

/** Commands that only make sense against a playing or paused session. */
export function requiresActiveSession(command: PlaybackCommand): boolean {
  switch (command.kind) {
    case 'pause':
    case 'resume':
    case 'toggle-pause':
    case 'seek':
    case 'skip':
    case 'volume':
      return true;
    case 'start':
    case 'stop':
    case 'output-route':
      return false;
  }
}

export function describeCommand(command: PlaybackCommand): Record<string, unknown> {
  switch (command.kind) {
    case 'start':
      return { kind: command.kind, name: command.name };
    case 'seek':
      return { kind: command.kind, seconds: command.seconds };
    case 'skip':
      return { kind: command.kind, delta: command.delta };
    case 'volume':
      return { kind: command.kind, level: command.level };
    case 'output-route':
      return { kind: command.kind, route: command.route };
    default:
      return { kind: command.kind };
  }
}

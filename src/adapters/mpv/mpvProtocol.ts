import type { PlayerEvent } from '@/domain/playback/events';
import type { PlayerCommand, PlayerProperty } from '@/ports/PlayerChannelPort';
import { isRecord } from '@/shared/utils/guards';

/**
 * JSON IPC framing used by mpv's `--input-ipc-server`: one JSON object per
 * line, requests tagged with `request_id`, replies echoing it alongside an
 * `error` string that reads "success" when the command worked.
 */
export type MpvMessage =
  | { kind: 'reply'; requestId: number; error: string; data: unknown }
  | { kind: 'event'; event: PlayerEvent }
  | { kind: 'ignored'; reason: string };

export const MPV_SUCCESS = 'success';

export function encodeCommand(command: PlayerCommand): Array<string | number | boolean> {
  switch (command.kind) {
    case 'get-property':
      return ['get_property', command.property];
    case 'set-property':
      return ['set_property', command.property, command.value];
    case 'seek':
      return ['seek', command.seconds, command.mode];
    case 'resync-audio':
      return ['ao-reload'];
    case 'quit':
      return ['quit'];
  }
}

export function encodeObserve(id: number, property: PlayerProperty): Array<string | number> {
  return ['observe_property', id, property];
}

export function frameRequest(command: Array<string | number | boolean>, requestId: number): string {
  return `${JSON.stringify({ command, request_id: requestId })}\n`;
}

export function commandName(command: PlayerCommand): string {
  return String(encodeCommand(command)[0]);
}

export function decodeMessage(line: string): MpvMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { kind: 'ignored', reason: 'invalid-json' };
  }
  if (!isRecord(parsed)) {
    return { kind: 'ignored', reason: 'not-an-object' };
  }
  if (typeof parsed.event === 'string') {
    return decodeEvent(parsed.event, parsed);
  }
  if (typeof parsed.request_id === 'number' && typeof parsed.error === 'string') {
    return {
      kind: 'reply',
      requestId: parsed.request_id,
      error: parsed.error,
      data: parsed.data ?? null,
    };
  }
  return { kind: 'ignored', reason: 'unrecognized-message' };
}

function decodeEvent(name: string, message: Record<string, unknown>): MpvMessage {
  switch (name) {
    case 'property-change':
      return decodePropertyChange(message.name, message.data);
    case 'end-file':
      return message.reason === 'eof'
        ? { kind: 'event', event: { type: 'end-of-file' } }
        : { kind: 'ignored', reason: `end-file:${String(message.reason ?? 'unknown')}` };
    case 'file-loaded':
      return { kind: 'event', event: { type: 'file-loaded' } };
    case 'shutdown':
      return { kind: 'event', event: { type: 'shutdown' } };
    case 'pause':
      return { kind: 'event', event: { type: 'pause-flag', paused: true } };
    case 'unpause':
      return { kind: 'event', event: { type: 'pause-flag', paused: false } };
    default:
      return { kind: 'ignored', reason: `event:${name}` };
  }
}

function decodePropertyChange(property: unknown, data: unknown): MpvMessage {
  switch (property) {
    case 'time-pos':
      return typeof data === 'number'
        ? { kind: 'event', event: { type: 'position', seconds: data } }
        : { kind: 'ignored', reason: 'time-pos:unavailable' };
    case 'duration':
      return typeof data === 'number'
        ? { kind: 'event', event: { type: 'duration', seconds: data } }
        : { kind: 'ignored', reason: 'duration:unavailable' };
    case 'volume':
      return typeof data === 'number'
        ? { kind: 'event', event: { type: 'volume', level: Math.round(data) } }
        : { kind: 'ignored', reason: 'volume:unavailable' };
    case 'pause':
      return typeof data === 'boolean'
        ? { kind: 'event', event: { type: 'pause-flag', paused: data } }
        : { kind: 'ignored', reason: 'pause:unavailable' };
    case 'eof-reached':
      return data === true
        ? { kind: 'event', event: { type: 'end-of-file' } }
        : { kind: 'ignored', reason: 'eof-reached:false' };
    default:
      return { kind: 'ignored', reason: `property:${String(property)}` };
  }
}

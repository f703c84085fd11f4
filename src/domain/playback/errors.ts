export type PlayerErrorCode =
  | 'validation-error'
  | 'invalid-filename'
  | 'media-not-found'
  | 'channel-unavailable'
  | 'channel-timeout'
  | 'channel-closed'
  | 'command-failed'
  | 'spawn-error'
  | 'busy'
  | 'no-active-session'
  | 'transfer-failed'
  | 'transfer-conflict'
  | 'payload-too-large';

const VALIDATION_CODES = new Set<PlayerErrorCode>([
  'validation-error',
  'invalid-filename',
  'media-not-found',
]);

const CHANNEL_CODES = new Set<PlayerErrorCode>([
  'channel-unavailable',
  'channel-timeout',
  'channel-closed',
]);

export type PlayerErrorDetails = Record<string, unknown>;

/**
 * Error raised by the playback core. `code` is stable and safe to return to
 * HTTP callers; `details` carries the offending value where there is one.
 */
export class PlayerError extends Error {
  public readonly code: PlayerErrorCode;
  public readonly details: PlayerErrorDetails;

  constructor(code: PlayerErrorCode, message: string, details: PlayerErrorDetails = {}) {
    super(message);
    this.name = 'PlayerError';
    this.code = code;
    this.details = details;
  }

  public get isValidation(): boolean {
    return VALIDATION_CODES.has(this.code);
  }

  /** Transient transport failures; the caller may re-issue the operation. */
  public get isTransient(): boolean {
    return CHANNEL_CODES.has(this.code);
  }
}

export function isPlayerError(error: unknown, code?: PlayerErrorCode): error is PlayerError {
  if (!(error instanceof PlayerError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function validationError(message: string, value: unknown): PlayerError {
  return new PlayerError('validation-error', message, { value });
}

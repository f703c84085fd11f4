import type { IncomingMessage, ServerResponse } from 'node:http';
import { isPlayerError, validationError, type PlayerErrorCode } from '@/domain/playback/errors';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerApiPort } from '@/ports/PlayerApiPort';
import { parseConfigPatch } from '@/application/config/configRepository';
import { closeAfterResponse, readJsonBody, sendJson } from '@/adapters/http/utils/jsonBody';
import { errorMessage } from '@/shared/bestEffort';
import { isRecord } from '@/shared/utils/guards';
import { logBuffer } from '@/shared/logging/logBuffer';
import { createLogger, logManager, parseLogLevel } from '@/shared/logging/logger';

export type PlayerApiOptions = {
  player: PlayerApiPort;
  configPort: ConfigPort;
};

type RouteHandler = (req: IncomingMessage, res: ServerResponse, match: RegExpMatchArray) => Promise<void>;

type Route = {
  method: string;
  pattern: RegExp;
  handler: RouteHandler;
};

const STATUS_BY_CODE: Record<PlayerErrorCode, number> = {
  'validation-error': 400,
  'invalid-filename': 400,
  'media-not-found': 404,
  'no-active-session': 409,
  'transfer-conflict': 409,
  'payload-too-large': 413,
  busy: 503,
  'channel-timeout': 504,
  'channel-closed': 502,
  'channel-unavailable': 502,
  'command-failed': 502,
  'spawn-error': 500,
  'transfer-failed': 500,
};

export function statusForError(code: PlayerErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * JSON routes under `/api` backed by the player service.
 */
export class PlayerApiHandler {
  private readonly log = createLogger('Http', 'PlayerApi');
  private readonly player: PlayerApiPort;
  private readonly configPort: ConfigPort;
  private readonly routes: Route[];

  constructor(options: PlayerApiOptions) {
    this.player = options.player;
    this.configPort = options.configPort;
    this.routes = this.buildRoutes();
  }

  public matches(pathname: string): boolean {
    return pathname === '/api' || pathname.startsWith('/api/');
  }

  public async handle(req: IncomingMessage, res: ServerResponse, pathname: string): Promise<void> {
    const method = (req.method ?? 'GET').toUpperCase();
    const suffix = pathname.slice('/api'.length).replace(/\/+$/, '') || '/';
    let methodMismatch = false;
    for (const route of this.routes) {
      const match = suffix.match(route.pattern);
      if (!match) {
        continue;
      }
      if (route.method !== method) {
        methodMismatch = true;
        continue;
      }
      try {
        await route.handler(req, res, match);
      } catch (error) {
        this.sendError(req, res, error);
      }
      return;
    }
    if (methodMismatch) {
      sendJson(res, 405, { error: 'method-not-allowed', message: `${method} not allowed on ${pathname}` });
      return;
    }
    sendJson(res, 404, { error: 'not-found', message: `No route for ${pathname}` });
  }

  private buildRoutes(): Route[] {
    return [
      {
        method: 'POST',
        pattern: /^\/play$/,
        handler: async (req, res) => {
          const body = await this.readBody(req, res);
          if (body === null) return;
          const file = body.file;
          const view =
            file === undefined || file === null || file === ''
              ? await this.player.resume()
              : await this.player.startSession(file);
          this.log.info('play request', { file: typeof file === 'string' ? file : null, state: view.state });
          sendJson(res, 200, { success: true, status: view });
        },
      },
      this.simple('/pause', () => this.player.pause()),
      this.simple('/resume', () => this.player.resume()),
      this.simple('/toggle', () => this.player.togglePause()),
      this.simple('/stop', () => this.player.stop()),
      this.withParam('/seek', 'position', (value) => this.player.seek(value)),
      this.withParam('/skip', 'seconds', (value) => this.player.skip(value)),
      this.withParam('/volume', 'level', (value) => this.player.setVolume(value)),
      this.withParam('/hdmi', 'output', (value) => this.player.setOutputRoute(value)),
      {
        method: 'GET',
        pattern: /^\/status$/,
        handler: async (_req, res) => sendJson(res, 200, this.player.getStatus()),
      },
      {
        method: 'GET',
        pattern: /^\/health$/,
        handler: async (_req, res) => sendJson(res, 200, await this.player.getHealth()),
      },
      {
        method: 'GET',
        pattern: /^\/files$/,
        handler: async (_req, res) => sendJson(res, 200, { success: true, files: await this.player.listMedia() }),
      },
      {
        method: 'PUT',
        pattern: /^\/files\/([^/]+)$/,
        handler: async (req, res, match) => this.handleUpload(req, res, decodeSegment(match[1])),
      },
      {
        method: 'DELETE',
        pattern: /^\/files\/([^/]+)$/,
        handler: async (_req, res, match) => {
          const name = decodeSegment(match[1]);
          await this.player.deleteMedia(name);
          this.log.info('file deleted', { name });
          sendJson(res, 200, { success: true });
        },
      },
      {
        method: 'GET',
        pattern: /^\/config$/,
        handler: async (_req, res) => sendJson(res, 200, this.configPort.getConfig()),
      },
      {
        method: 'POST',
        pattern: /^\/config$/,
        handler: async (req, res) => this.handleConfigUpdate(req, res),
      },
      {
        method: 'GET',
        pattern: /^\/logs$/,
        handler: async (req, res) => {
          const tail = Number(new URL(req.url ?? '/', 'http://localhost').searchParams.get('tail'));
          sendJson(res, 200, logBuffer.snapshot(Number.isInteger(tail) && tail > 0 ? tail : undefined));
        },
      },
    ];
  }

  private simple(path: string, action: () => Promise<unknown>): Route {
    return {
      method: 'POST',
      pattern: new RegExp(`^${path}$`),
      handler: async (_req, res) => {
        const view = await action();
        sendJson(res, 200, { success: true, status: view });
      },
    };
  }

  private withParam(path: string, key: string, action: (value: unknown) => Promise<unknown>): Route {
    return {
      method: 'POST',
      pattern: new RegExp(`^${path}$`),
      handler: async (req, res) => {
        const body = await this.readBody(req, res);
        if (body === null) return;
        if (!(key in body)) {
          throw validationError(`Missing '${key}' parameter`, body);
        }
        const view = await action(body[key]);
        this.log.info('command request', { path, [key]: body[key] });
        sendJson(res, 200, { success: true, status: view });
      },
    };
  }

  private async handleUpload(req: IncomingMessage, res: ServerResponse, name: string): Promise<void> {
    const header = req.headers['content-length'];
    const declared = header !== undefined && /^\d+$/.test(header) ? Number(header) : null;
    const handle = await this.player.beginUpload(name, declared);
    const abort = (reason: string) => this.player.abortUpload(handle, reason);
    req.once('aborted', () => {
      void abort('client aborted');
    });
    try {
      await this.player.receiveUpload(handle, req);
      const file = await this.player.completeUpload(handle);
      this.log.info('file uploaded', { name: file.name, size: file.size });
      sendJson(res, 201, { success: true, file });
    } catch (error) {
      await abort(errorMessage(error));
      throw error;
    }
  }

  private async handleConfigUpdate(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req, res);
    if (body === null) return;
    const patch = parseConfigPatch(body);
    const config = await this.configPort.updateConfig((current) => {
      Object.assign(current, patch);
    });
    if (patch.logLevel) {
      logManager.configure({ level: parseLogLevel(patch.logLevel) });
    }
    this.log.info('configuration updated', { keys: Object.keys(patch) });
    sendJson(res, 200, { success: true, config });
  }

  /** Resolves the JSON object body, `{}` when empty, or null when a response was already sent. */
  private async readBody(req: IncomingMessage, res: ServerResponse): Promise<Record<string, unknown> | null> {
    const body = await readJsonBody(req, res);
    if (body === null) {
      return null;
    }
    if (body === undefined) {
      return {};
    }
    if (!isRecord(body)) {
      throw validationError('Request body must be a JSON object', body);
    }
    return body;
  }

  private sendError(req: IncomingMessage, res: ServerResponse, error: unknown): void {
    if (res.headersSent) {
      this.log.warn('error after response started', { message: errorMessage(error) });
      res.end();
      return;
    }
    if (isPlayerError(error)) {
      const status = statusForError(error.code);
      const log = status >= 500 ? this.log.error.bind(this.log) : this.log.warn.bind(this.log);
      log('request failed', { url: req.url, code: error.code, message: error.message });
      sendJson(res, status, { success: false, error: error.code, message: error.message });
    } else {
      this.log.error('unexpected api error', { url: req.url, message: errorMessage(error) });
      sendJson(res, 500, { success: false, error: 'http-internal-error', message: 'Internal server error' });
    }
    // An upload refused part way leaves the rest of its body unread.
    if (req.method === 'PUT' && !req.complete) {
      closeAfterResponse(req, res);
    }
  }
}

function decodeSegment(segment: string | undefined): string {
  if (!segment) {
    return '';
  }
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { HttpServerConfig } from '@/config/http';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerApiPort } from '@/ports/PlayerApiPort';
import { PlayerApiHandler } from '@/adapters/http/playerApi/playerApiHandler';
import { StatusGateway, STATUS_FEED_PATH } from '@/adapters/http/events/statusGateway';
import { sendJson } from '@/adapters/http/utils/jsonBody';

/**
 * Hosts the JSON control API and the WebSocket status feed.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly playerApi: PlayerApiHandler;
  private readonly statusFeed: StatusGateway;
  private server: http.Server | null = null;

  constructor(
    private readonly config: HttpServerConfig,
    options: {
      player: PlayerApiPort;
      configPort: ConfigPort;
    },
  ) {
    this.playerApi = new PlayerApiHandler({ player: options.player, configPort: options.configPort });
    this.statusFeed = new StatusGateway(options.player);
  }

  /** Bound address once listening; the port differs from config when it was 0. */
  public address(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    return { host: address.address, port: address.port };
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.log.error('http request failed', { message: errorMessage(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { success: false, error: 'http-internal-error', message: 'Internal server error' });
        } else {
          res.end();
        }
      });
    });

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        this.log.info('http gateway listening', {
          port: this.config.port,
          host: this.config.host,
        });
        resolve();
      });
    });
    this.server = server;
  }

  public async stop(): Promise<void> {
    this.statusFeed.close();
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = this.normalizePath(req.url ?? '/');

    if (pathname === '/') {
      sendJson(res, 200, {
        name: 'headless-player',
        api: '/api',
        events: STATUS_FEED_PATH,
      });
      return;
    }

    if (pathname === STATUS_FEED_PATH) {
      res.writeHead(426, { 'Content-Type': 'text/plain' });
      res.end('Upgrade Required');
      return;
    }

    if (this.playerApi.matches(pathname)) {
      await this.playerApi.handle(req, res, pathname);
      return;
    }

    sendJson(res, 404, { error: 'not-found', message: `No route for ${pathname}` });
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.statusFeed.handleUpgrade(req, socket, head)) {
      return;
    }
    socket.destroy();
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Cache-Control', 'no-cache');
  }

  /**
   * Path segments stay percent-encoded here; the API decodes each file name
   * segment itself so an encoded `/` cannot split a route.
   */
  private normalizePath(url: string): string {
    const [path] = url.split('?');
    return path || '/';
  }
}

import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import type { SessionView } from '@/domain/playback/types';
import type { PlayerApiPort } from '@/ports/PlayerApiPort';
import { createLogger } from '@/shared/logging/logger';

export const STATUS_FEED_PATH = '/api/events';

/**
 * WebSocket feed that sends the current `SessionView` on connect and again
 * after every change.
 */
export class StatusGateway {
  private readonly log = createLogger('Http', 'StatusFeed');
  private readonly wsServer = new WebSocketServer({ noServer: true });
  private readonly unsubscribe: () => void;

  constructor(private readonly player: Pick<PlayerApiPort, 'getStatus' | 'onStatusChange'>) {
    this.wsServer.on('connection', (socket: WebSocket) => this.handleConnection(socket));
    this.unsubscribe = player.onStatusChange((view) => this.broadcast(view));
  }

  public get clientCount(): number {
    return this.wsServer.clients.size;
  }

  public handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const pathname = (request.url ?? '').split('?')[0];
    if (pathname !== STATUS_FEED_PATH) {
      return false;
    }
    this.wsServer.handleUpgrade(request, socket, head, (ws) => {
      this.wsServer.emit('connection', ws, request);
    });
    return true;
  }

  public close(): void {
    this.unsubscribe();
    for (const client of this.wsServer.clients) {
      client.terminate();
    }
    this.wsServer.close();
  }

  private handleConnection(socket: WebSocket): void {
    this.log.debug('status client connected', { clients: this.clientCount });
    socket.on('error', (error) => {
      this.log.debug('status client error', { message: error.message });
    });
    socket.on('close', () => {
      this.log.debug('status client disconnected', { clients: this.clientCount });
    });
    this.send(socket, this.player.getStatus());
  }

  private broadcast(view: SessionView): void {
    for (const client of this.wsServer.clients) {
      this.send(client, view);
    }
  }

  private send(socket: WebSocket, view: SessionView): void {
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }
    socket.send(JSON.stringify({ type: 'status', status: view }));
  }
}

import { EventEmitter } from 'node:events';
import { promises as fs } from 'node:fs';
import net from 'node:net';
import { PlayerError } from '@/domain/playback/errors';
import type { PlayerEvent } from '@/domain/playback/events';
import type {
  PlayerChannel,
  PlayerCommand,
  PlayerEventListener,
  PlayerProperty,
  PlayerReply,
} from '@/ports/PlayerChannelPort';
import {
  commandName,
  decodeMessage,
  encodeCommand,
  encodeObserve,
  frameRequest,
  MPV_SUCCESS,
} from '@/adapters/mpv/mpvProtocol';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { retryWithDelay } from '@/shared/utils/wait';

export type MpvIpcChannelOptions = {
  requestTimeoutMs?: number;
  connectAttempts?: number;
  connectIntervalMs?: number;
};

interface PendingRequest {
  command: string;
  resolve: (reply: PlayerReply) => void;
  reject: (error: PlayerError) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 3000;
const DEFAULT_CONNECT_ATTEMPTS = 10;
const DEFAULT_CONNECT_INTERVAL_MS = 200;
const MAX_LINE_BYTES = 1024 * 1024;

/**
 * Unix-socket JSON IPC client for one mpv process.
 */
export class MpvIpcChannel implements PlayerChannel {
  private readonly log = createLogger('Player', 'Channel');
  private readonly emitter = new EventEmitter();
  private readonly pending = new Map<number, PendingRequest>();
  private readonly observed: PlayerProperty[] = [];
  private readonly requestTimeoutMs: number;
  private readonly connectAttempts: number;
  private readonly connectIntervalMs: number;
  private socket: net.Socket | null = null;
  private connectPromise: Promise<void> | null = null;
  private buffer = '';
  private nextRequestId = 0;
  private closed = false;

  constructor(
    public readonly endpoint: string,
    options: MpvIpcChannelOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.connectAttempts = options.connectAttempts ?? DEFAULT_CONNECT_ATTEMPTS;
    this.connectIntervalMs = options.connectIntervalMs ?? DEFAULT_CONNECT_INTERVAL_MS;
  }

  public isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  public async connect(): Promise<void> {
    if (this.closed) {
      throw new PlayerError('channel-closed', 'control channel already closed', {
        endpoint: this.endpoint,
      });
    }
    if (this.isConnected()) {
      return;
    }
    if (!this.connectPromise) {
      this.connectPromise = this.connectWithRetry().finally(() => {
        this.connectPromise = null;
      });
    }
    await this.connectPromise;
  }

  public async send(command: PlayerCommand): Promise<PlayerReply> {
    return this.request(commandName(command), encodeCommand(command));
  }

  public async observe(properties: readonly PlayerProperty[]): Promise<void> {
    const added: PlayerProperty[] = [];
    for (const property of properties) {
      if (!this.observed.includes(property)) {
        this.observed.push(property);
        added.push(property);
      }
    }
    if (!this.isConnected()) {
      return;
    }
    for (const property of added) {
      await this.request('observe_property', encodeObserve(this.observed.indexOf(property) + 1, property));
    }
  }

  public onEvent(listener: PlayerEventListener): () => void {
    this.emitter.on('event', listener);
    return () => this.emitter.off('event', listener);
  }

  public onClose(listener: (reason: string) => void): () => void {
    this.emitter.on('close', listener);
    return () => this.emitter.off('close', listener);
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
    this.rejectPending('control channel closed');
    this.emitter.removeAllListeners();
  }

  private async connectWithRetry(): Promise<void> {
    try {
      await retryWithDelay(
        async () => {
          if (this.closed) {
            throw new Error('channel closed while connecting');
          }
          const socket = await this.openSocket();
          this.attach(socket);
        },
        {
          attempts: this.connectAttempts,
          delayMs: this.connectIntervalMs,
          onRetry: (attempt, error) =>
            this.log.spam('control socket not ready', {
              endpoint: this.endpoint,
              attempt,
              message: errorMessage(error),
            }),
        },
      );
    } catch (error) {
      throw new PlayerError(
        'channel-unavailable',
        `control socket not available after ${this.connectAttempts} attempts`,
        { endpoint: this.endpoint, attempts: this.connectAttempts, cause: errorMessage(error) },
      );
    }
    this.log.debug('control channel connected', { endpoint: this.endpoint });
    // Re-register observers so the event stream resumes after a reconnect.
    for (const [index, property] of this.observed.entries()) {
      await this.request('observe_property', encodeObserve(index + 1, property));
    }
  }

  private async openSocket(): Promise<net.Socket> {
    await fs.access(this.endpoint);
    return new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection(this.endpoint);
      const onError = (error: Error) => {
        socket.destroy();
        reject(error);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    this.buffer = '';
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(chunk));
    socket.on('error', (error) => {
      this.log.debug('control socket error', { endpoint: this.endpoint, message: error.message });
    });
    socket.on('close', () => this.handleSocketClose(socket));
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;
    let idx = this.buffer.indexOf('\n');
    while (idx >= 0) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (line) {
        this.handleLine(line);
      }
      idx = this.buffer.indexOf('\n');
    }
    if (this.buffer.length > MAX_LINE_BYTES) {
      this.log.warn('dropping oversized control message', { bytes: this.buffer.length });
      this.buffer = '';
    }
  }

  private handleLine(line: string): void {
    const message = decodeMessage(line);
    switch (message.kind) {
      case 'reply': {
        const entry = this.pending.get(message.requestId);
        if (!entry) {
          this.log.spam('reply without pending request', { requestId: message.requestId });
          return;
        }
        this.pending.delete(message.requestId);
        clearTimeout(entry.timer);
        if (message.error !== MPV_SUCCESS) {
          entry.reject(
            new PlayerError('command-failed', `${entry.command} failed: ${message.error}`, {
              command: entry.command,
              error: message.error,
            }),
          );
          return;
        }
        entry.resolve({ data: message.data });
        return;
      }
      case 'event':
        this.emitEvent(message.event);
        return;
      case 'ignored':
        this.log.spam('ignored control message', { reason: message.reason });
        return;
    }
  }

  private emitEvent(event: PlayerEvent): void {
    for (const listener of this.emitter.listeners('event')) {
      try {
        listener(event);
      } catch (error) {
        this.log.warn('player event listener failed', { type: event.type, message: errorMessage(error) });
      }
    }
  }

  private request(command: string, payload: Array<string | number | boolean>): Promise<PlayerReply> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(
        new PlayerError('channel-closed', 'control channel is not connected', {
          endpoint: this.endpoint,
          command,
        }),
      );
    }
    this.nextRequestId += 1;
    const requestId = this.nextRequestId;
    return new Promise<PlayerReply>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(
          new PlayerError('channel-timeout', `no reply to ${command} within ${this.requestTimeoutMs}ms`, {
            command,
            timeoutMs: this.requestTimeoutMs,
          }),
        );
      }, this.requestTimeoutMs);
      this.pending.set(requestId, { command, resolve, reject, timer });
      this.log.spam('control request', { command, requestId });
      socket.write(frameRequest(payload, requestId), (error) => {
        if (!error) {
          return;
        }
        const entry = this.pending.get(requestId);
        if (!entry) {
          return;
        }
        this.pending.delete(requestId);
        clearTimeout(entry.timer);
        entry.reject(
          new PlayerError('channel-closed', `write failed for ${command}: ${error.message}`, { command }),
        );
      });
    });
  }

  private handleSocketClose(socket: net.Socket): void {
    if (this.socket !== socket) {
      return;
    }
    this.socket = null;
    this.buffer = '';
    this.rejectPending('control socket closed by peer');
    if (!this.closed) {
      this.log.debug('control socket closed', { endpoint: this.endpoint });
      this.emitter.emit('close', 'peer closed the control socket');
    }
  }

  private rejectPending(reason: string): void {
    for (const [requestId, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new PlayerError('channel-closed', reason, { command: entry.command, requestId }));
    }
    this.pending.clear();
  }
}

export function createMpvChannelFactory(options: MpvIpcChannelOptions = {}) {
  return (endpoint: string): PlayerChannel => new MpvIpcChannel(endpoint, options);
}

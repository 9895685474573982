/**
 * State Socket Server
 *
 * Loopback WebSocket feed for UI clients. A new client gets `initial_state`,
 * then every coalesced batch of state events. Clients can ask for history or
 * watcher snapshots and report panel visibility.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { z } from 'zod';
import { getErrorMessage } from '@notiflux/core';
import type {
  IconPayload,
  InitialState,
  NotificationView,
  StateClientMessage,
  StateEvent,
  StateServerMessage,
  WatcherResultView,
} from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { sendStateMessage } from './ws-utils.js';

export const DEFAULT_STATE_HOST = '127.0.0.1';

const clientMessageSchema: z.ZodType<StateClientMessage> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get_history'), full: z.boolean().optional() }),
  z.object({ type: z.literal('get_watchers') }),
  z.object({ type: z.literal('get_icon'), id: z.number().int().min(1), size: z.number().int().min(8).max(512).optional() }),
  z.object({ type: z.literal('get_theme') }),
  z.object({ type: z.literal('panel_visibility'), visible: z.boolean() }),
]);

export const DEFAULT_ICON_REQUEST_SIZE = 64;

export interface StateProvider {
  initialState(): InitialState;
  history(full: boolean): NotificationView[];
  watchers(): WatcherResultView[];
  /** Decoded icon of a notification, or null when it has none. */
  icon(id: number, size: number): Promise<IconPayload | null>;
  theme(): Promise<Extract<StateServerMessage, { type: 'theme' }>>;
  setPanelVisible(visible: boolean): void;
}

export interface StateSocketServerConfig {
  port: number;
  host?: string;
  provider: StateProvider;
  logger?: Logger;
}

export class StateSocketServer {
  private port: number;
  private host: string;
  private provider: StateProvider;
  private wss: WebSocketServer | null = null;
  private logger: Logger;

  constructor(config: StateSocketServerConfig) {
    this.port = config.port;
    this.host = config.host ?? DEFAULT_STATE_HOST;
    this.provider = config.provider;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get debug() { return this.logger.debug.bind(this.logger); }

  /**
   * Start listening.
   * @returns the bound port (useful when configured with 0)
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.port, host: this.host });
      const onError = (err: Error): void => {
        wss.close();
        reject(err);
      };
      wss.once('error', onError);
      wss.once('listening', () => {
        wss.off('error', onError);
        wss.on('error', (err) => this.logger.warn(`State socket error: ${err.message}`));
        this.wss = wss;
        const port = this.boundPort();
        this.log(`State feed on ws://${this.host}:${port}`);
        resolve(port);
      });
      wss.on('connection', (ws) => this.accept(ws));
    });
  }

  /** Send one batch to every connected client. */
  broadcast(events: StateEvent[]): number {
    if (!this.wss || events.length === 0) return 0;
    let sent = 0;
    for (const client of this.wss.clients) {
      if (sendStateMessage(client, { type: 'state_events', events })) sent++;
    }
    return sent;
  }

  get clientCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;
    for (const client of wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private boundPort(): number {
    const address = this.wss?.address();
    return address !== undefined && typeof address === 'object' ? address.port : this.port;
  }

  private accept(ws: WebSocket): void {
    this.debug(`State client connected (${this.clientCount})`);
    sendStateMessage(ws, { type: 'initial_state', state: this.provider.initialState() });
    ws.on('message', (data) => this.handleMessage(ws, data));
    ws.on('error', (err) => this.debug(`State client error: ${err.message}`));
  }

  private handleMessage(ws: WebSocket, data: RawData): void {
    let message: StateClientMessage;
    try {
      const parsed = clientMessageSchema.safeParse(JSON.parse(data.toString()));
      if (!parsed.success) {
        sendStateMessage(ws, { type: 'error', message: 'unknown message' });
        return;
      }
      message = parsed.data;
    } catch (err) {
      sendStateMessage(ws, { type: 'error', message: `invalid JSON: ${getErrorMessage(err)}` });
      return;
    }

    switch (message.type) {
      case 'get_history':
        sendStateMessage(ws, { type: 'history', history: this.provider.history(message.full ?? false) });
        break;
      case 'get_watchers':
        sendStateMessage(ws, { type: 'watchers', watchers: this.provider.watchers() });
        break;
      case 'get_icon': {
        const { id } = message;
        const size = message.size ?? DEFAULT_ICON_REQUEST_SIZE;
        this.reply(ws, this.provider.icon(id, size).then((icon): StateServerMessage => ({ type: 'icon', id, size, icon })));
        break;
      }
      case 'get_theme':
        this.reply(ws, this.provider.theme());
        break;
      case 'panel_visibility':
        this.provider.setPanelVisible(message.visible);
        break;
    }
  }

  private reply(ws: WebSocket, pending: Promise<StateServerMessage>): void {
    pending
      .then((message) => {
        sendStateMessage(ws, message);
      })
      .catch((err: unknown) => {
        sendStateMessage(ws, { type: 'error', message: getErrorMessage(err) });
      });
  }
}

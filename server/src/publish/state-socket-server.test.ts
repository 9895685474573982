/**
 * Tests for StateSocketServer
 *
 * Binds an in-process server on an ephemeral loopback port.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { WebSocket } from 'ws';
import type { InitialState, StateServerMessage } from '@notiflux/core';
import { StateSocketServer } from './state-socket-server.js';
import type { StateProvider } from './state-socket-server.js';

const initial: InitialState = {
  history: [],
  counts: { total: 0, active: 0, unread: 0, criticalActive: 0 },
  dnd: { mode: 'off', active: false, manual: false, scheduled: false },
  watchers: [],
  panelVisible: false,
  configVersion: 1,
};

/** Connect and collect messages; resolves once `count` have arrived. */
function connect(port: number): { ws: WebSocket; next: (count: number) => Promise<StateServerMessage[]> } {
  const ws = new WebSocket(`ws://127.0.0.1:${port}`);
  const messages: StateServerMessage[] = [];
  const waiters: Array<{ count: number; resolve: (messages: StateServerMessage[]) => void }> = [];
  ws.on('message', (data) => {
    messages.push(JSON.parse(data.toString()));
    for (const waiter of [...waiters]) {
      if (messages.length >= waiter.count) {
        waiters.splice(waiters.indexOf(waiter), 1);
        waiter.resolve(messages.slice(0, waiter.count));
      }
    }
  });
  return {
    ws,
    next: (count) =>
      new Promise((resolve) => {
        if (messages.length >= count) {
          resolve(messages.slice(0, count));
        } else {
          waiters.push({ count, resolve });
        }
      }),
  };
}

describe('StateSocketServer', () => {
  let visibility: boolean[];
  let server: StateSocketServer;
  let port: number;
  let clients: WebSocket[];

  beforeEach(async () => {
    visibility = [];
    clients = [];
    const provider: StateProvider = {
      initialState: () => initial,
      history: () => [],
      watchers: () => [],
      icon: (id, size) => Promise.resolve(id === 1 ? { width: size, height: size, rgba: 'AAAA' } : null),
      theme: () => Promise.resolve({ type: 'theme', assets: [{ name: 'base', css: '.nf {}' }], errors: [] }),
      setPanelVisible: (visible) => visibility.push(visible),
    };
    server = new StateSocketServer({ port: 0, provider });
    port = await server.start();
  });

  afterEach(async () => {
    for (const ws of clients) ws.close();
    await server.stop();
  });

  it('greets new clients with the initial state', async () => {
    const client = connect(port);
    clients.push(client.ws);
    const [first] = await client.next(1);
    expect(first).toEqual({ type: 'initial_state', state: initial });
  });

  it('broadcasts event batches to connected clients', async () => {
    const client = connect(port);
    clients.push(client.ws);
    await client.next(1);
    expect(server.broadcast([{ type: 'config_reloaded', version: 2 }])).toBe(1);
    const messages = await client.next(2);
    expect(messages[1]).toEqual({ type: 'state_events', events: [{ type: 'config_reloaded', version: 2 }] });
  });

  it('answers snapshot requests and records panel visibility', async () => {
    const client = connect(port);
    clients.push(client.ws);
    await client.next(1);
    client.ws.send(JSON.stringify({ type: 'panel_visibility', visible: true }));
    client.ws.send(JSON.stringify({ type: 'get_watchers' }));
    const messages = await client.next(2);
    expect(messages[1]).toEqual({ type: 'watchers', watchers: [] });
    expect(visibility).toEqual([true]);
  });

  it('serves decoded icons and the theme bundle', async () => {
    const client = connect(port);
    clients.push(client.ws);
    await client.next(1);
    client.ws.send(JSON.stringify({ type: 'get_icon', id: 1, size: 32 }));
    const withIcon = await client.next(2);
    expect(withIcon[1]).toEqual({ type: 'icon', id: 1, size: 32, icon: { width: 32, height: 32, rgba: 'AAAA' } });

    client.ws.send(JSON.stringify({ type: 'get_icon', id: 9 }));
    const withoutIcon = await client.next(3);
    expect(withoutIcon[2]).toEqual({ type: 'icon', id: 9, size: 64, icon: null });

    client.ws.send(JSON.stringify({ type: 'get_theme' }));
    const withTheme = await client.next(4);
    expect(withTheme[3]).toEqual({ type: 'theme', assets: [{ name: 'base', css: '.nf {}' }], errors: [] });
  });

  it('reports unknown messages', async () => {
    const client = connect(port);
    clients.push(client.ws);
    await client.next(1);
    client.ws.send(JSON.stringify({ type: 'reboot' }));
    const messages = await client.next(2);
    expect(messages[1]).toEqual({ type: 'error', message: 'unknown message' });
  });
});

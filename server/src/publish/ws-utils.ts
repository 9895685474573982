/**
 * WebSocket Utilities
 */

import { WebSocket } from 'ws';
import type { StateServerMessage } from '@notiflux/core';

/**
 * Send a message to a state client if the connection is still open.
 * @returns whether the message was handed to the socket
 */
export function sendStateMessage(ws: WebSocket, message: StateServerMessage): boolean {
  if (ws.readyState !== WebSocket.OPEN) {
    return false;
  }
  ws.send(JSON.stringify(message));
  return true;
}

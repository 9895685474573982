/**
 * Control channel client.
 *
 * Sends one command to the running daemon and waits for its single-line
 * reply. Used by the companion panel and by scripts bound to hotkeys.
 */

import { createConnection } from 'node:net';
import { z } from 'zod';
import { NotifluxError } from '../errors.js';
import { getErrorMessage } from '../logging/error-utils.js';
import { resolveControlSocketPath } from '../config/paths.js';
import type { ControlCommandInput } from './types.js';

export const DEFAULT_CONTROL_TIMEOUT_MS = 2000;

/** Exit codes for scripts wrapping `runControlCommand`. */
export const ControlExitCode = {
  Ok: 0,
  Unreachable: 1,
  Rejected: 2,
} as const;

export type ControlExitCode = (typeof ControlExitCode)[keyof typeof ControlExitCode];

const controlReplySchema = z.union([
  z.object({
    ok: z.literal(true),
    result: z.object({ kind: z.enum(['ack', 'state', 'dnd', 'notifications']) }).passthrough(),
  }),
  z.object({
    ok: z.literal(false),
    error: z.object({ code: z.string(), message: z.string() }),
  }),
]);

/** Reply as seen by the client: only the envelope is checked. */
export type ControlReply = z.infer<typeof controlReplySchema>;

/** The daemon could not be reached or did not answer in time. */
export class ControlUnreachableError extends NotifluxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
  }
}

export interface ControlClientOptions {
  socketPath?: string;
  timeoutMs?: number;
}

/**
 * Send one command and resolve with the daemon's reply.
 * @throws ControlUnreachableError when the socket is missing, closes early or times out
 * @throws NotifluxError when the reply is not a valid envelope
 */
export function sendControlCommand(
  command: ControlCommandInput,
  options: ControlClientOptions = {},
): Promise<ControlReply> {
  const socketPath = options.socketPath ?? resolveControlSocketPath();
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    const socket = createConnection(socketPath);
    let buffer = '';
    let settled = false;

    const finish = (outcome: { reply: ControlReply } | { error: Error }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      if ('reply' in outcome) {
        resolve(outcome.reply);
      } else {
        reject(outcome.error);
      }
    };

    const timer = setTimeout(() => {
      finish({ error: new ControlUnreachableError(`no reply from ${socketPath} within ${timeoutMs}ms`) });
    }, timeoutMs);

    socket.setEncoding('utf-8');

    socket.on('connect', () => {
      socket.write(`${JSON.stringify(command)}\n`);
    });

    socket.on('data', (chunk: string) => {
      buffer += chunk;
      const newline = buffer.indexOf('\n');
      if (newline === -1) return;
      const line = buffer.slice(0, newline);
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        finish({ error: new NotifluxError('protocol', `unreadable reply: ${getErrorMessage(err)}`) });
        return;
      }
      const parsed = controlReplySchema.safeParse(raw);
      if (parsed.success) {
        finish({ reply: parsed.data });
      } else {
        finish({ error: new NotifluxError('protocol', 'reply is not a control response') });
      }
    });

    socket.on('error', (err) => {
      finish({
        error: new ControlUnreachableError(`cannot reach ${socketPath}: ${getErrorMessage(err)}`, {
          cause: err,
        }),
      });
    });

    socket.on('close', () => {
      finish({ error: new ControlUnreachableError(`${socketPath} closed before replying`) });
    });
  });
}

/**
 * Send a command and map the outcome to a process exit code:
 * 0 on success, 1 when the daemon is unreachable, 2 when the command was
 * malformed or rejected.
 */
export async function runControlCommand(
  command: ControlCommandInput,
  options: ControlClientOptions = {},
): Promise<{ exitCode: ControlExitCode; reply: ControlReply | null; error: string | null }> {
  try {
    const reply = await sendControlCommand(command, options);
    if (reply.ok) {
      return { exitCode: ControlExitCode.Ok, reply, error: null };
    }
    return { exitCode: ControlExitCode.Rejected, reply, error: reply.error.message };
  } catch (err) {
    const exitCode = err instanceof ControlUnreachableError ? ControlExitCode.Unreachable : ControlExitCode.Rejected;
    return { exitCode, reply: null, error: getErrorMessage(err) };
  }
}

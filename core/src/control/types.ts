/**
 * Control channel messages.
 *
 * Requests and responses are single JSON objects, one per line, over the
 * daemon's Unix control socket.
 */

import { z } from 'zod';
import { ProtocolError } from '../errors.js';
import type { DndStatus } from '../events/types.js';
import type { HistoryCounts, NotificationView } from '../notifications/types.js';

const notificationIdSchema = z.number().int().min(1).max(0xffffffff);

export const controlCommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('open-panel') }).strict(),
  z.object({ command: z.literal('close-panel') }).strict(),
  z.object({ command: z.literal('toggle-panel') }).strict(),
  z.object({ command: z.literal('toggle-dnd') }).strict(),
  z.object({ command: z.literal('set-dnd'), enabled: z.boolean() }).strict(),
  z.object({ command: z.literal('clear-history') }).strict(),
  z.object({ command: z.literal('list-active'), full: z.boolean().default(false) }).strict(),
  z
    .object({
      command: z.literal('list-history'),
      full: z.boolean().default(false),
      limit: z.number().int().min(1).optional(),
    })
    .strict(),
  z.object({ command: z.literal('dismiss'), id: notificationIdSchema }).strict(),
  z
    .object({
      command: z.literal('invoke-action'),
      id: notificationIdSchema,
      action: z.string().min(1).default('default'),
    })
    .strict(),
  z.object({ command: z.literal('get-state') }).strict(),
  z.object({ command: z.literal('set-panel-visible'), visible: z.boolean() }).strict(),
]);

export type ControlCommand = z.infer<typeof controlCommandSchema>;
export type ControlCommandInput = z.input<typeof controlCommandSchema>;
export type ControlCommandName = ControlCommand['command'];

export interface ControlState {
  dnd: DndStatus;
  counts: HistoryCounts;
  panelVisible: boolean;
  configVersion: number;
}

export type ControlResult =
  | { kind: 'ack' }
  | { kind: 'state'; state: ControlState }
  | { kind: 'dnd'; status: DndStatus }
  | { kind: 'notifications'; notifications: NotificationView[] };

export interface ControlErrorBody {
  code: string;
  message: string;
}

export type ControlResponse =
  | { ok: true; result: ControlResult }
  | { ok: false; error: ControlErrorBody };

/**
 * Parse one request line.
 * @throws ProtocolError when the line is not JSON or not a known command
 */
export function parseControlRequest(line: string): ControlCommand {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError('request is not valid JSON');
  }
  const result = controlCommandSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ProtocolError(`malformed command: ${detail}`);
  }
  return result.data;
}

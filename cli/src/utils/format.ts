/**
 * Formatting of control replies for the terminal.
 *
 * Replies are only envelope-checked by the client, so each result shape is
 * validated here before it is printed. Anything unexpected falls back to JSON.
 */

import { z } from "zod";
import { isUrgency, urgencyName } from "@notiflux/core";

const notificationLineSchema = z.object({
  id: z.number(),
  appName: z.string(),
  summary: z.string(),
  body: z.string().optional(),
  urgency: z.number(),
  closed: z.boolean(),
  closeReason: z.string().nullable(),
  repeatCount: z.number(),
  receivedAt: z.number(),
});

const notificationsResultSchema = z.object({
  notifications: z.array(notificationLineSchema),
});

const dndStatusSchema = z.object({ mode: z.string() });

const dndResultSchema = z.object({ status: dndStatusSchema });

const stateResultSchema = z.object({
  state: z.object({
    dnd: dndStatusSchema,
    counts: z.object({
      total: z.number(),
      active: z.number(),
      unread: z.number(),
      criticalActive: z.number(),
    }),
    panelVisible: z.boolean(),
    configVersion: z.number(),
  }),
});

export type NotificationLine = z.infer<typeof notificationLineSchema>;

/**
 * Format elapsed milliseconds as "now", "Xm", "Xh" or "Xd".
 */
export function formatAge(elapsedMs: number): string {
  const minutes = Math.floor(Math.max(0, elapsedMs) / 60_000);
  if (minutes < 1) return "now";
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h`;
  return `${Math.floor(hours / 24)}d`;
}

function urgencyLabel(urgency: number): string {
  return isUrgency(urgency) ? urgencyName(urgency) : String(urgency);
}

export function formatNotification(line: NotificationLine, now: number): string[] {
  const repeat = line.repeatCount > 1 ? ` (x${line.repeatCount})` : "";
  const closed = line.closed ? ` [${line.closeReason ?? "closed"}]` : "";
  const lines = [
    `#${line.id} ${urgencyLabel(line.urgency)} ${line.appName}: ${line.summary}${repeat}${closed} - ${formatAge(now - line.receivedAt)}`,
  ];
  if (line.body) {
    lines.push(...line.body.split("\n").map((text) => `    ${text}`));
  }
  return lines;
}

/**
 * Human-readable lines for a successful control result.
 */
export function formatResult(result: { kind: string }, now: number = Date.now()): string[] {
  switch (result.kind) {
    case "ack":
      return [];
    case "dnd": {
      const parsed = dndResultSchema.safeParse(result);
      if (parsed.success) return [`Do not disturb: ${parsed.data.status.mode}`];
      break;
    }
    case "notifications": {
      const parsed = notificationsResultSchema.safeParse(result);
      if (parsed.success) {
        if (parsed.data.notifications.length === 0) return ["No notifications"];
        return parsed.data.notifications.flatMap((line) => formatNotification(line, now));
      }
      break;
    }
    case "state": {
      const parsed = stateResultSchema.safeParse(result);
      if (parsed.success) {
        const { dnd, counts, panelVisible, configVersion } = parsed.data.state;
        return [
          `Do not disturb: ${dnd.mode}`,
          `Notifications: ${counts.active} open (${counts.unread} unread, ${counts.criticalActive} critical), ${counts.total} held`,
          `Panel: ${panelVisible ? "visible" : "hidden"}`,
          `Config version: ${configVersion}`,
        ];
      }
      break;
    }
  }
  return [JSON.stringify(result, null, 2)];
}

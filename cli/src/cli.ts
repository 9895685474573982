#!/usr/bin/env node
/**
 * notiflux CLI
 *
 * Commands:
 *   notiflux [daemon]          - Run the notification daemon
 *   notiflux panel <action>    - Open, close or toggle the panel
 *   notiflux dnd [on|off]      - Toggle or set do-not-disturb
 *   notiflux list              - List open notifications (or history)
 *   notiflux dismiss <id>      - Dismiss a notification
 *   notiflux invoke <id> [key] - Invoke a notification action
 *   notiflux clear             - Clear history
 *   notiflux state             - Show daemon state
 */

import { Command } from "commander";
import { DAEMON_VERSION } from "@notiflux/server";
import { parseId, sendCommand, startDaemonCommand } from "./commands/index.js";

const program = new Command();

program
  .name("notiflux")
  .description("Desktop notification daemon and its control client")
  .version(DAEMON_VERSION);

program
  .command("daemon", { isDefault: true })
  .description("Run the notification daemon in the foreground")
  .option("--no-dbus", "Do not export the D-Bus service")
  .option("--state-port <port>", "Port for the state WebSocket (negative disables it)")
  .option("-q, --quiet", "Suppress daemon logging")
  .action(startDaemonCommand);

program
  .command("panel <action>")
  .description("Open, close or toggle the panel")
  .action(async (action: string) => {
    if (action !== "open" && action !== "close" && action !== "toggle") {
      console.error(`Unknown panel action: ${action}`);
      process.exitCode = 2;
      return;
    }
    await sendCommand({ command: `${action}-panel` });
  });

program
  .command("dnd [state]")
  .description("Toggle do-not-disturb, or set it with on/off")
  .option("--json", "Print the raw reply")
  .action(async (state: string | undefined, options: { json?: boolean }) => {
    if (state === undefined || state === "toggle") {
      await sendCommand({ command: "toggle-dnd" }, options);
    } else if (state === "on" || state === "off") {
      await sendCommand({ command: "set-dnd", enabled: state === "on" }, options);
    } else {
      console.error(`Unknown DND state: ${state}`);
      process.exitCode = 2;
    }
  });

program
  .command("list")
  .description("List open notifications")
  .option("--history", "Include closed notifications")
  .option("--full", "Include bodies")
  .option("-l, --limit <n>", "Maximum entries (history only)")
  .option("--json", "Print the raw reply")
  .action(async (options: { history?: boolean; full?: boolean; limit?: string; json?: boolean }) => {
    const full = options.full ?? false;
    if (!options.history) {
      await sendCommand({ command: "list-active", full }, options);
      return;
    }
    const limit = options.limit === undefined ? undefined : parseId(options.limit);
    if (limit === null) return;
    await sendCommand({ command: "list-history", full, limit }, options);
  });

program
  .command("dismiss <id>")
  .description("Dismiss a notification (a second dismiss removes it from history)")
  .action(async (value: string) => {
    const id = parseId(value);
    if (id !== null) await sendCommand({ command: "dismiss", id });
  });

program
  .command("invoke <id> [action]")
  .description("Invoke a notification action (default: the default action)")
  .action(async (value: string, action: string | undefined) => {
    const id = parseId(value);
    if (id !== null) await sendCommand({ command: "invoke-action", id, action });
  });

program
  .command("clear")
  .description("Close all notifications and clear history")
  .action(() => sendCommand({ command: "clear-history" }));

program
  .command("state")
  .description("Show daemon state")
  .option("--json", "Print the raw reply")
  .action((options: { json?: boolean }) => sendCommand({ command: "get-state" }, options));

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

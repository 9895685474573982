/**
 * Daemon command: run notiflux in the foreground.
 */

import { runDaemon } from "@notiflux/server";

export interface DaemonCommandOptions {
  dbus: boolean;
  statePort?: string;
  quiet?: boolean;
}

export async function startDaemonCommand(options: DaemonCommandOptions): Promise<void> {
  let statePort: number | undefined;
  if (options.statePort !== undefined) {
    statePort = Number.parseInt(options.statePort, 10);
    if (!Number.isInteger(statePort)) {
      console.error(`Invalid --state-port: ${options.statePort}`);
      process.exitCode = 2;
      return;
    }
  }
  process.exitCode = await runDaemon({
    enableDbus: options.dbus,
    silent: options.quiet ?? false,
    ...(statePort !== undefined ? { statePort } : {}),
  });
}

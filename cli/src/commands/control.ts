/**
 * Control commands: one request to the running daemon, printed result,
 * exit code 0 / 1 (unreachable) / 2 (rejected).
 */

import { ControlExitCode, runControlCommand } from "@notiflux/core";
import type { ControlCommandInput } from "@notiflux/core";
import { formatResult } from "../utils/format.js";

export interface OutputOptions {
  json?: boolean;
}

export async function sendCommand(
  command: ControlCommandInput,
  options: OutputOptions = {},
): Promise<void> {
  const { exitCode, reply, error } = await runControlCommand(command);
  process.exitCode = exitCode;

  if (exitCode === ControlExitCode.Unreachable) {
    console.error(`notiflux daemon is not reachable: ${error}`);
    return;
  }
  if (options.json && reply) {
    console.log(JSON.stringify(reply, null, 2));
    return;
  }
  if (!reply || !reply.ok) {
    console.error(`Rejected: ${error}`);
    return;
  }
  for (const line of formatResult(reply.result)) {
    console.log(line);
  }
}

/**
 * Parse a notification id argument.
 * @returns the id, or null after reporting a usage error
 */
export function parseId(value: string): number | null {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1 || id > 0xffffffff) {
    console.error(`Not a notification id: ${value}`);
    process.exitCode = ControlExitCode.Rejected;
    return null;
  }
  return id;
}

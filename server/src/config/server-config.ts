/**
 * Server constants
 *
 * Process-level settings that come from the environment rather than from
 * config.json: where the sockets live and which port the state feed uses.
 */

import { resolveConfigDir, resolveControlSocketPath, resolveStateDir } from '@notiflux/core';

export const DEFAULT_STATE_PORT = 4733;

/** Reported by GetServerInformation. */
export const DAEMON_VERSION = '0.3.0';

export interface ServerConfig {
  configDir: string;
  stateDir: string;
  controlSocketPath: string;
  /** Loopback port for the state WebSocket; 0 binds a free port, negative disables it. */
  statePort: number;
  /** Export the D-Bus service. Off in tests. */
  enableDbus: boolean;
  silent: boolean;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_STATE_PORT;
  const port = Number.parseInt(raw, 10);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : DEFAULT_STATE_PORT;
}

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    configDir: resolveConfigDir(env),
    stateDir: resolveStateDir(env),
    controlSocketPath: resolveControlSocketPath(env),
    statePort: parsePort(env.NOTIFLUX_STATE_PORT),
    enableDbus: env.NOTIFLUX_NO_DBUS !== '1',
    silent: false,
  };
}

/**
 * Control Socket Server
 *
 * Unix socket carrying newline-delimited JSON. Each request line gets exactly
 * one response line; a connection may send any number of requests.
 */

import { connect, createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { createInterface } from 'node:readline';
import { chmod, lstat, mkdir, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StartupError, getErrorMessage, isConnectionRefusedError, isNotFoundError } from '@notiflux/core';
import type { ControlResponse } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

/** Longest request line accepted before the connection is dropped. */
export const MAX_REQUEST_BYTES = 64 * 1024;

/** Resolves true when a process accepts connections on `socketPath`. */
function socketInUse(socketPath: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const socket = connect(socketPath);
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('error', (err) => {
      socket.destroy();
      if (isConnectionRefusedError(err) || isNotFoundError(err)) {
        resolve(false);
      } else {
        reject(err);
      }
    });
  });
}

export interface ControlServerConfig {
  socketPath: string;
  handleLine: (line: string) => ControlResponse;
  logger?: Logger;
}

export class ControlServer {
  private socketPath: string;
  private handleLine: (line: string) => ControlResponse;
  private server: Server | null = null;
  private connections = new Set<Socket>();
  private logger: Logger;

  constructor(config: ControlServerConfig) {
    this.socketPath = config.socketPath;
    this.handleLine = config.handleLine;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  /**
   * Bind the socket, replacing a stale one left by a previous run.
   * @throws StartupError when the socket cannot be bound or another daemon is serving it
   */
  async start(): Promise<void> {
    let live: boolean;
    try {
      await mkdir(dirname(this.socketPath), { recursive: true, mode: 0o700 });
      live = (await this.hasSocketFile()) && (await socketInUse(this.socketPath));
      if (!live) {
        await unlink(this.socketPath).catch((err: unknown) => {
          if (!isNotFoundError(err)) throw err;
        });
      }
    } catch (err) {
      throw new StartupError(`cannot prepare ${this.socketPath}: ${getErrorMessage(err)}`, { cause: err });
    }
    if (live) {
      throw new StartupError(`${this.socketPath} is already in use by a running daemon`);
    }

    const server = createServer((socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new StartupError(`cannot bind ${this.socketPath}: ${err.message}`, { cause: err }));
      };
      server.once('error', onError);
      server.listen(this.socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });
    server.on('error', (err) => {
      this.warn(`Control socket error: ${err.message}`);
    });
    this.server = server;
    await chmod(this.socketPath, 0o600);
    this.log(`Control socket listening on ${this.socketPath}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    try {
      await unlink(this.socketPath);
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.warn(`Failed to remove ${this.socketPath}: ${getErrorMessage(err)}`);
      }
    }
  }

  /** True when a socket file is at the path; anything else there is an error. */
  private async hasSocketFile(): Promise<boolean> {
    try {
      const stats = await lstat(this.socketPath);
      if (!stats.isSocket()) {
        throw new Error(`${this.socketPath} exists and is not a socket`);
      }
      return true;
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  private accept(socket: Socket): void {
    this.connections.add(socket);
    socket.setEncoding('utf-8');

    // Bytes received since the last newline; readline buffers them unbounded.
    let partialBytes = 0;
    socket.on('data', (chunk: Buffer | string) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
      const lastNewline = text.lastIndexOf('\n');
      partialBytes =
        lastNewline === -1 ? partialBytes + Buffer.byteLength(text) : Buffer.byteLength(text.slice(lastNewline + 1));
      if (partialBytes > MAX_REQUEST_BYTES) {
        this.warn('Dropping control connection: request too large');
        socket.destroy();
      }
    });

    const lines = createInterface({ input: socket, crlfDelay: Infinity });

    lines.on('line', (line) => {
      if (line.trim() === '') return;
      if (Buffer.byteLength(line) > MAX_REQUEST_BYTES) {
        this.warn('Dropping control connection: request too large');
        socket.destroy();
        return;
      }
      const response = this.handleLine(line);
      if (!socket.destroyed) {
        socket.write(`${JSON.stringify(response)}\n`);
      }
    });

    socket.on('error', (err) => {
      this.logger.debug(`Control connection error: ${err.message}`);
    });
    socket.on('close', () => {
      this.connections.delete(socket);
      lines.close();
    });
  }
}

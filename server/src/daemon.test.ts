/**
 * Tests for daemon wiring
 *
 * Runs the whole daemon in process: temp config/state dirs, a real control
 * socket, an ephemeral state port, no session bus and no child processes.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ControlExitCode, runControlCommand, sendControlCommand } from '@notiflux/core';
import { startDaemon } from './daemon.js';
import type { Daemon } from './daemon.js';
import { createFakeSpawner } from './testing/fake-process.js';
import { makeRequest } from './testing/fixtures.js';
import { HISTORY_FILE_NAME } from './store/history-persistence.js';

describe('startDaemon', () => {
  let dir: string;
  let socketPath: string;
  let daemon: Daemon | null;

  const start = (): Promise<Daemon> =>
    startDaemon({
      configDir: join(dir, 'config'),
      stateDir: join(dir, 'state'),
      controlSocketPath: socketPath,
      statePort: -1,
      enableDbus: false,
      silent: true,
      soundBackend: null,
      spawner: createFakeSpawner().spawner,
      watchDirectory: () => ({ close: () => {} }),
    });

  const writeConfig = async (config: object): Promise<void> => {
    await mkdir(join(dir, 'config'), { recursive: true });
    await writeFile(join(dir, 'config', 'config.json'), JSON.stringify(config));
  };

  const historyFile = (): string => join(dir, 'state', HISTORY_FILE_NAME);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'notiflux-daemon-'));
    socketPath = join(dir, 'run', 'control.sock');
    daemon = null;
  });

  afterEach(async () => {
    await daemon?.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('creates default theme files and serves the control socket', async () => {
    daemon = await start();
    const css = await readFile(join(dir, 'config', 'base.css'), 'utf-8');
    expect(css.length).toBeGreaterThan(0);

    const reply = await sendControlCommand({ command: 'get-state' }, { socketPath });
    expect(reply).toEqual({
      ok: true,
      result: {
        kind: 'state',
        state: {
          dnd: { mode: 'off', active: false, manual: false, scheduled: false },
          counts: { total: 0, active: 0, unread: 0, criticalActive: 0 },
          panelVisible: false,
          configVersion: 1,
        },
      },
    });
  });

  it('lists notifications received by the server', async () => {
    daemon = await start();
    daemon.server.notify(makeRequest({ summary: 'Build finished' }));
    const reply = await sendControlCommand({ command: 'list-active' }, { socketPath });
    expect(reply.ok && reply.result.kind).toBe('notifications');
    expect(daemon.server.history.list().map((n) => n.summary)).toEqual(['Build finished']);
  });

  it('applies a reloaded config', async () => {
    daemon = await start();
    await writeFile(join(dir, 'config', 'config.json'), JSON.stringify({ history: { maxEntries: 1 } }));
    const result = await daemon.config.reload();
    expect(result.ok).toBe(true);

    daemon.server.notify(makeRequest({ summary: 'a' }));
    daemon.server.notify(makeRequest({ summary: 'b' }));
    expect(daemon.server.history.size).toBe(1);
    expect(daemon.control.getState().configVersion).toBe(2);
  });

  it('keeps the previous config when a reload is invalid', async () => {
    daemon = await start();
    const info = daemon.server.getServerInformation();
    const capabilities = daemon.server.getCapabilities();

    await writeFile(join(dir, 'config', 'config.json'), '{ "history": ');
    const result = await daemon.config.reload();
    expect(result.ok).toBe(false);
    expect(daemon.config.current().version).toBe(1);
    expect(daemon.server.getServerInformation()).toEqual(info);
    expect(daemon.server.getCapabilities()).toEqual(capabilities);
  });

  it('keeps history in memory only by default', async () => {
    daemon = await start();
    const id = daemon.server.notify(makeRequest({ summary: 'private' }));
    daemon.server.closeNotification(id);
    await daemon.stop();

    await expect(access(historyFile())).rejects.toThrow();
    daemon = await start();
    expect(daemon.server.history.size).toBe(0);
  });

  it('persists closed history across restarts when enabled', async () => {
    await writeConfig({ history: { persist: true } });
    daemon = await start();
    const id = daemon.server.notify(makeRequest({ summary: 'kept' }));
    daemon.server.closeNotification(id);
    await daemon.stop();

    const saved = await readFile(historyFile(), 'utf-8');
    expect(saved).toContain('"kept"');

    daemon = await start();
    expect(daemon.server.history.list().map((n) => n.summary)).toEqual(['kept']);
    expect(daemon.server.notify(makeRequest({ summary: 'next' }))).toBe(id + 1);
  });

  it('deletes saved history when persistence is switched off', async () => {
    await writeConfig({ history: { persist: true } });
    daemon = await start();
    const id = daemon.server.notify(makeRequest({ summary: 'kept' }));
    daemon.server.closeNotification(id);
    await daemon.stop();
    await readFile(historyFile(), 'utf-8');

    daemon = await start();
    await writeConfig({ history: { persist: false } });
    const result = await daemon.config.reload();
    expect(result.ok).toBe(true);
    await daemon.stop();
    await expect(access(historyFile())).rejects.toThrow();
  });

  it('leaves a running daemon reachable when a second one cannot start', async () => {
    daemon = await start();
    await expect(start()).rejects.toThrow(/already in use/);

    const result = await runControlCommand({ command: 'get-state' }, { socketPath });
    expect(result.exitCode).toBe(ControlExitCode.Ok);
  });

  it('fails to start when the control socket path is unusable', async () => {
    await writeFile(join(dir, 'run'), 'a file where the socket dir should be');
    await expect(start()).rejects.toThrow(/cannot prepare/);
  });
});

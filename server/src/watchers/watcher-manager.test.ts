/**
 * Tests for WatcherManager
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getDefaultConfig } from '@notiflux/core';
import type { WidgetsConfig } from '@notiflux/core';
import { CommandBudget } from '../commands/command-budget.js';
import { createFakeSpawner } from '../testing/fake-process.js';
import type { FakeProcess } from '../testing/fake-process.js';
import { WatcherManager, watcherDefinitions } from './watcher-manager.js';
import { WatcherResultStore } from './watcher-results.js';
import type { WatcherResultWriter } from './watcher-results.js';

const flush = () => new Promise((resolve) => setImmediate(resolve));

function widgets(overrides: Partial<WidgetsConfig> = {}): WidgetsConfig {
  return { ...getDefaultConfig().widgets, ...overrides };
}

const NO_BUILTINS = { network: false, bluetooth: false, audio: false, radioKill: false };

describe('watcherDefinitions', () => {
  it('lists the built-ins by default', () => {
    expect(watcherDefinitions(widgets()).map((d) => d.id)).toEqual([
      'network',
      'bluetooth',
      'radio-kill',
      'audio',
    ]);
  });

  it('only the audio built-in has a watch command', () => {
    const withWatch = watcherDefinitions(widgets()).filter((d) => d.watchCommand !== undefined);
    expect(withWatch.map((d) => [d.id, d.watchCommand])).toEqual([['audio', 'pactl subscribe']]);
  });

  it('lets a user watcher replace or disable a built-in', () => {
    const defs = watcherDefinitions(
      widgets({
        watchers: [
          { id: 'network', command: 'cat /tmp/net', parser: 'toggle', enabled: true },
          { id: 'bluetooth', command: 'true', parser: 'text', enabled: false },
        ],
      }),
    );
    expect(defs.map((d) => d.id)).toEqual(['network', 'radio-kill', 'audio']);
    expect(defs[0].command).toBe('cat /tmp/net');
  });

  it('picks the refresh interval from the command kind', () => {
    const defs = watcherDefinitions(
      widgets({
        builtins: NO_BUILTINS,
        watchers: [
          { id: 'file', command: 'cat /tmp/x', parser: 'text', enabled: true },
          { id: 'player', command: 'playerctl status', parser: 'text', enabled: true },
          { id: 'custom', command: 'date', parser: 'text', intervalMs: 500, enabled: true },
        ],
      }),
    );
    expect(defs.map((d) => [d.id, d.kind, d.intervalMs])).toEqual([
      ['file', 'fast', 1000],
      ['player', 'slow', 3000],
      ['custom', 'fast', 500],
    ]);
  });
});

describe('WatcherManager', () => {
  let spawned: FakeProcess[];
  let budget: CommandBudget;
  let store: WatcherResultStore;
  let writer: WatcherResultWriter;
  let manager: WatcherManager | null;

  beforeEach(() => {
    const fake = createFakeSpawner();
    spawned = fake.spawned;
    budget = new CommandBudget({ maxConcurrent: 2, spawner: fake.spawner, random: () => 0 });
    store = new WatcherResultStore({ now: () => 5 });
    writer = store.createWriter();
    manager = null;
  });

  afterEach(() => {
    manager?.stop();
  });

  function twoWatchers(): WidgetsConfig {
    return widgets({
      builtins: NO_BUILTINS,
      watchers: [
        { id: 'load', command: 'cat /proc/loadavg', parser: 'text', enabled: true },
        { id: 'wifi', command: 'cat /tmp/wifi', parser: 'toggle', enabled: true },
      ],
    });
  }

  it('spawns nothing until the panel is visible', () => {
    manager = new WatcherManager({ budget, writer, widgets: twoWatchers() });
    expect(manager.isVisible()).toBe(false);
    expect(spawned).toHaveLength(0);
  });

  it('probes every watcher when the panel becomes visible', async () => {
    manager = new WatcherManager({ budget, writer, widgets: twoWatchers() });
    manager.setVisible(true);
    expect(spawned.map((p) => p.args[0])).toEqual(['/proc/loadavg', '/tmp/wifi']);

    await spawned[0].finish('0.15 0.20 0.30\n');
    await spawned[1].finish('on\n');
    await flush();

    expect(store.get('load')?.value).toEqual({ kind: 'text', text: '0.15 0.20 0.30' });
    expect(store.get('wifi')?.value).toEqual({ kind: 'toggle', on: true });
  });

  it('discards probes still running when the panel hides', async () => {
    manager = new WatcherManager({ budget, writer, widgets: twoWatchers() });
    manager.setVisible(true);
    manager.setVisible(false);
    await spawned[0].finish('1\n');
    await spawned[1].finish('on\n');
    await flush();

    expect(store.snapshot()).toEqual([]);
  });

  it('applies the concurrency ceiling from config', async () => {
    manager = new WatcherManager({ budget, writer, widgets: { ...twoWatchers(), maxConcurrent: 1 } });
    manager.setVisible(true);
    expect(spawned).toHaveLength(1);
    await flush();
    expect(store.get('wifi')?.error).toBe('command budget exhausted');
    await spawned[0].finish('0.1\n');
  });

  it('drops results of watchers removed by a reload', () => {
    manager = new WatcherManager({ budget, writer, widgets: twoWatchers() });
    writer.publish('load', { kind: 'text', text: '1' }, '1');
    writer.publish('wifi', { kind: 'toggle', on: false }, 'off');

    manager.reconfigure(
      widgets({
        builtins: NO_BUILTINS,
        watchers: [{ id: 'wifi', command: 'cat /tmp/wifi', parser: 'toggle', enabled: true }],
      }),
    );

    expect(manager.ids).toEqual(['wifi']);
    expect(store.get('load')).toBeNull();
    expect(store.get('wifi')?.value).toEqual({ kind: 'toggle', on: false });
    expect(spawned).toHaveLength(0);
  });
});

/**
 * Config loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../errors.js';
import {
  buildConfigSnapshot,
  getDefaultConfig,
  loadConfigSnapshot,
  parseConfig,
  readConfigFile,
} from './load.js';

describe('getDefaultConfig', () => {
  it('fills every section', () => {
    const config = getDefaultConfig();
    expect(config.popups.defaultTimeoutMs).toBe(5000);
    expect(config.popups.criticalTimeoutMs).toBeNull();
    expect(config.history.maxEntries).toBe(200);
    expect(config.history.dedupWindowMs).toBe(2000);
    expect(config.widgets.maxConcurrent).toBe(2);
    expect(config.widgets.builtins.audio).toBe(true);
    expect(config.sound.defaultName).toBe('message-new-instant');
    expect(config.dnd.windows).toEqual([]);
    expect(config.theme.panelCss).toBe('panel.css');
  });
});

describe('parseConfig', () => {
  it('applies defaults inside partially specified sections', () => {
    const config = parseConfig({
      dnd: { windows: [{ start: '22:00', end: '07:00' }] },
    });
    expect(config.dnd.windows[0].days).toEqual(['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']);
    expect(config.dnd.criticalBypass).toBe(true);
  });

  it('lists every invalid field', () => {
    try {
      parseConfig({ history: { maxEntries: 0 }, dnd: { windows: [{ start: '25:00', end: '07:00' }] } });
      throw new Error('expected a ConfigError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const issues = err instanceof ConfigError ? err.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0].startsWith('history.maxEntries:')).toBe(true);
      expect(issues[1]).toBe('dnd.windows.0.start: expected HH:MM (24h)');
    }
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ popups: { timeout: 3 } })).toThrow(ConfigError);
  });

  it('rejects delays past the timer limit', () => {
    expect(() => parseConfig({ rules: [{ actions: [{ type: 'set-timeout', ms: 3_000_000_000 }] }] })).toThrow(
      ConfigError,
    );
    expect(() => parseConfig({ popups: { defaultTimeoutMs: 2 ** 31 } })).toThrow(ConfigError);
    expect(parseConfig({ popups: { criticalTimeoutMs: 2 ** 31 - 1 } }).popups.criticalTimeoutMs).toBe(2 ** 31 - 1);
  });

  it('rejects unknown rule actions', () => {
    expect(() => parseConfig({ rules: [{ actions: [{ type: 'explode' }] }] })).toThrow(ConfigError);
  });
});

describe('reading from disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'notiflux-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when the file is missing', async () => {
    const { source, config } = await readConfigFile(join(dir, 'config.json'));
    expect(source).toBe('defaults');
    expect(config.general.logLevel).toBe('info');
  });

  it('rejects malformed JSON', async () => {
    await writeFile(join(dir, 'config.json'), '{ "general": ');
    await expect(readConfigFile(join(dir, 'config.json'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('builds a frozen snapshot with compiled rules and theme paths', async () => {
    await writeFile(
      join(dir, 'config.json'),
      JSON.stringify({
        theme: { popupCss: 'themes/popup.css' },
        rules: [{ name: 'mute spam', match: { app: { glob: 'spam*' } }, actions: [{ type: 'suppress' }] }],
      }),
    );
    const snapshot = await loadConfigSnapshot(dir, 3);
    expect(snapshot.version).toBe(3);
    expect(snapshot.source).toBe('file');
    expect(snapshot.rules.map((rule) => rule.name)).toEqual(['mute spam']);
    expect(snapshot.themePaths.popup).toBe(join(dir, 'themes', 'popup.css'));
    expect(snapshot.themePaths.base).toBe(join(dir, 'base.css'));
    expect(Object.isFrozen(snapshot.config.popups)).toBe(true);
  });

  it('fails the load on a malformed rule pattern', async () => {
    await writeFile(
      join(dir, 'config.json'),
      JSON.stringify({ rules: [{ match: { summary: { glob: '{a' } }, actions: [{ type: 'mute-sound' }] }] }),
    );
    await expect(loadConfigSnapshot(dir, 1)).rejects.toThrow('rules.0.match.summary');
  });
});

describe('buildConfigSnapshot', () => {
  it('records the load time and source', () => {
    const snapshot = buildConfigSnapshot({
      config: getDefaultConfig(),
      source: 'defaults',
      configDir: '/tmp/notiflux-test',
      version: 1,
      now: 42,
    });
    expect(snapshot.loadedAt).toBe(42);
    expect(snapshot.configPath).toBe('/tmp/notiflux-test/config.json');
  });
});

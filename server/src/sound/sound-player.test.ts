/**
 * Tests for SoundPlayer
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { getDefaultConfig } from '@notiflux/core';
import type { SoundConfig } from '@notiflux/core';
import { CommandBudget } from '../commands/command-budget.js';
import { createFakeSpawner } from '../testing/fake-process.js';
import type { FakeProcess } from '../testing/fake-process.js';
import { makeNotification } from '../testing/fixtures.js';
import { SoundPlayer, backendArgv, decodeFileUri, soundFromHints } from './sound-player.js';
import type { SoundBackend } from './sound-player.js';

describe('decodeFileUri', () => {
  it('decodes local file URIs', () => {
    expect(decodeFileUri('file:///home/me/bell%20one.oga')).toBe('/home/me/bell one.oga');
    expect(decodeFileUri('file://localhost/tmp/x.wav')).toBe('/tmp/x.wav');
    expect(decodeFileUri('file:///tmp/caf%C3%A9.wav')).toBe('/tmp/café.wav');
  });

  it('refuses remote hosts, bad escapes and NUL bytes', () => {
    expect(decodeFileUri('file://example.com/x.wav')).toBeNull();
    expect(decodeFileUri('file:///tmp/%zz.wav')).toBeNull();
    expect(decodeFileUri('file:///tmp/a%00b.wav')).toBeNull();
    expect(decodeFileUri('file:///tmp/%ff.wav')).toBeNull();
    expect(decodeFileUri('/tmp/x.wav')).toBeNull();
  });
});

describe('soundFromHints', () => {
  it('prefers sound-file over sound-name', () => {
    const n = makeNotification({ hints: { 'sound-file': 'file:///tmp/a.wav', 'sound-name': 'bell' } });
    expect(soundFromHints(n)).toEqual({ kind: 'file', path: '/tmp/a.wav' });
  });

  it('falls back to sound-name when the file is unusable', () => {
    const n = makeNotification({ hints: { 'sound-file': 'file://remote/a.wav', 'sound-name': 'bell' } });
    expect(soundFromHints(n)).toEqual({ kind: 'name', name: 'bell' });
  });

  it('accepts plain absolute paths', () => {
    expect(soundFromHints(makeNotification({ hints: { 'sound-file': ' /tmp/b.ogg ' } }))).toEqual({
      kind: 'file',
      path: '/tmp/b.ogg',
    });
  });
});

describe('backendArgv', () => {
  it('canberra takes names and files', () => {
    expect(backendArgv('canberra', { kind: 'name', name: 'bell' })).toEqual(['canberra-gtk-play', '-i', 'bell']);
    expect(backendArgv('canberra', { kind: 'file', path: '/a b.wav' })).toEqual([
      'canberra-gtk-play',
      '-f',
      '/a b.wav',
    ]);
  });

  it('file-only backends refuse names', () => {
    expect(backendArgv('paplay', { kind: 'name', name: 'bell' })).toBeNull();
    expect(backendArgv('pw-play', { kind: 'file', path: '/a.wav' })).toEqual(['pw-play', '/a.wav']);
  });
});

describe('SoundPlayer', () => {
  let spawned: FakeProcess[];
  let budget: CommandBudget;
  let now: number;

  beforeEach(() => {
    const fake = createFakeSpawner();
    spawned = fake.spawned;
    budget = new CommandBudget({ maxConcurrent: 2, spawner: fake.spawner });
    now = 10_000;
  });

  function player(overrides: Partial<SoundConfig> = {}, backend: SoundBackend | null = 'canberra'): SoundPlayer {
    return new SoundPlayer({
      sound: { ...getDefaultConfig().sound, ...overrides },
      configDir: '/cfg',
      budget,
      backend,
      now: () => now,
    });
  }

  it('plays the default theme sound', async () => {
    const pending = player().playFor(makeNotification());
    expect(spawned[0].program).toBe('canberra-gtk-play');
    expect(spawned[0].args).toEqual(['-i', 'message-new-instant']);
    await spawned[0].finish('');
    await expect(pending).resolves.toBe('played');
  });

  it('passes file paths without a shell', async () => {
    const pending = player({ defaultFile: 'sounds/ping (1).wav' }, 'paplay').playFor(makeNotification());
    expect(spawned[0].program).toBe('paplay');
    expect(spawned[0].args).toEqual(['/cfg/sounds/ping (1).wav']);
    await spawned[0].finish('');
    await pending;
  });

  it('stays quiet when disabled, suppressed or held by do-not-disturb', async () => {
    await expect(player({ enabled: false }).playFor(makeNotification())).resolves.toBe('disabled');
    await expect(player({}, null).playFor(makeNotification())).resolves.toBe('disabled');
    const p = player();
    await expect(p.playFor({ ...makeNotification(), suppressSound: true })).resolves.toBe('suppressed');
    await expect(p.playFor(makeNotification({ hints: { 'suppress-sound': true } }))).resolves.toBe('suppressed');
    await expect(p.playFor(makeNotification(), false)).resolves.toBe('suppressed');
    expect(spawned).toHaveLength(0);
  });

  it('rate limits bursts', async () => {
    const p = player();
    const first = p.playFor(makeNotification());
    now += 149;
    await expect(p.playFor(makeNotification())).resolves.toBe('rate-limited');
    now += 1;
    const third = p.playFor(makeNotification());
    expect(spawned).toHaveLength(2);
    await spawned[0].finish('');
    await spawned[1].finish('');
    await Promise.all([first, third]);
  });

  it('reports file-only backends that get a sound name', async () => {
    await expect(player({}, 'pw-play').playFor(makeNotification())).resolves.toBe('unsupported');
  });

  it('only advertises sound with a backend', () => {
    expect(player().supportsSound()).toBe(true);
    expect(player({}, null).supportsSound()).toBe(false);
    expect(player({ enabled: false }).supportsSound()).toBe(false);
  });
});

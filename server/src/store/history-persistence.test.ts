/**
 * Tests for HistoryPersistence
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CloseReason } from '@notiflux/core';
import type { Notification } from '@notiflux/core';
import { HistoryPersistence } from './history-persistence.js';
import { makeNotification } from '../testing/fixtures.js';

describe('HistoryPersistence', () => {
  let dir: string;
  let entries: Notification[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'notiflux-history-'));
    entries = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function create(): HistoryPersistence {
    return new HistoryPersistence({ stateDir: dir, readEntries: () => entries });
  }

  it('loads nothing when no file exists', async () => {
    await expect(create().load()).resolves.toEqual([]);
  });

  it('writes closed entries only and restores them as seen', async () => {
    entries = [
      {
        ...makeNotification({ summary: 'closed', hints: { 'sound-name': 'bell' } }),
        id: 4,
        closed: true,
        closeReason: CloseReason.Expired,
      },
      { ...makeNotification({ summary: 'open' }), id: 5 },
    ];
    const persistence = create();
    await persistence.flush();

    const raw: unknown = JSON.parse(await readFile(join(dir, 'history.json'), 'utf-8'));
    expect(raw).toMatchObject({ version: 1, entries: [{ id: 4, summary: 'closed' }] });

    const restored = await persistence.load();
    expect(restored).toHaveLength(1);
    expect(restored[0].id).toBe(4);
    expect(restored[0].hints).toEqual({});
    expect(restored[0].unread).toBe(false);
    expect(restored[0].closeReason).toBe(CloseReason.Expired);
  });

  it('ignores files in an unknown format', async () => {
    await writeFile(join(dir, 'history.json'), JSON.stringify({ version: 9, entries: [] }));
    await expect(create().load()).resolves.toEqual([]);
  });
});

/**
 * History Persistence
 *
 * Optional on-disk copy of closed history, written debounced to
 * $XDG_STATE_HOME/notiflux/history.json and restored at startup.
 * Hints and inline pixel data are never written.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { getErrorMessage, isNotFoundError } from '@notiflux/core';
import type { Notification } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

export const HISTORY_FILE_NAME = 'history.json';
const FORMAT_VERSION = 1;

const persistedEntrySchema = z.object({
  id: z.number().int().min(1),
  appName: z.string(),
  appIcon: z.string(),
  summary: z.string(),
  body: z.string(),
  actions: z.array(z.object({ key: z.string(), label: z.string() })),
  urgency: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  category: z.string().nullable(),
  transient: z.boolean(),
  resident: z.boolean(),
  image: z.object({ imagePath: z.string(), iconName: z.string() }),
  expireTimeout: z.number().int(),
  receivedAt: z.number(),
  updatedAt: z.number(),
  closeReason: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
  repeatCount: z.number().int().min(1),
});

const persistedHistorySchema = z.object({
  version: z.literal(FORMAT_VERSION),
  entries: z.array(persistedEntrySchema),
});

type PersistedEntry = z.infer<typeof persistedEntrySchema>;

function toPersisted(entry: Notification): PersistedEntry | null {
  if (!entry.closed || entry.closeReason === null) return null;
  return {
    id: entry.id,
    appName: entry.appName,
    appIcon: entry.appIcon,
    summary: entry.summary,
    body: entry.body,
    actions: entry.actions,
    urgency: entry.urgency,
    category: entry.category,
    transient: entry.transient,
    resident: entry.resident,
    image: { imagePath: entry.image.imagePath, iconName: entry.image.iconName },
    expireTimeout: entry.expireTimeout,
    receivedAt: entry.receivedAt,
    updatedAt: entry.updatedAt,
    closeReason: entry.closeReason,
    repeatCount: entry.repeatCount,
  };
}

function fromPersisted(entry: PersistedEntry): Notification {
  return {
    ...entry,
    hints: {},
    closed: true,
    unread: false,
    suppressPopup: false,
    suppressSound: false,
    dndExempt: false,
  };
}

export interface HistoryPersistenceConfig {
  stateDir: string;
  /** Source of the entries to write, oldest first. */
  readEntries: () => Notification[];
  debounceMs?: number;
  logger?: Logger;
}

export class HistoryPersistence {
  private filePath: string;
  private readEntries: () => Notification[];
  private debounceMs: number;
  private logger: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** In-flight write; a new save waits for it. */
  private writing: Promise<void> | null = null;

  constructor(config: HistoryPersistenceConfig) {
    this.filePath = path.join(config.stateDir, HISTORY_FILE_NAME);
    this.readEntries = config.readEntries;
    this.debounceMs = config.debounceMs ?? 1000;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get warn() { return this.logger.warn.bind(this.logger); }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Read persisted entries. A missing or unreadable file yields none;
   * the daemon starts with empty history rather than failing.
   */
  async load(): Promise<Notification[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.warn(`Failed to read ${this.filePath}: ${getErrorMessage(err)}`);
      }
      return [];
    }
    try {
      const parsed = persistedHistorySchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        this.warn(`Ignoring ${this.filePath}: unexpected format`);
        return [];
      }
      return parsed.data.entries.map(fromPersisted);
    } catch (err) {
      this.warn(`Ignoring ${this.filePath}: ${getErrorMessage(err)}`);
      return [];
    }
  }

  /** Schedule a write after the debounce window. */
  scheduleSave(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((err: unknown) => {
        this.warn(`Failed to write history: ${getErrorMessage(err)}`);
      });
    }, this.debounceMs);
  }

  /** Write now, cancelling any pending debounced write. */
  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.writing) {
      await this.writing;
    }
    this.writing = this.write().finally(() => {
      this.writing = null;
    });
    return this.writing;
  }

  /** Cancel pending writes without flushing. */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Cancel pending writes and delete the saved file. */
  async discard(): Promise<void> {
    this.cancel();
    if (this.writing) {
      await this.writing;
    }
    try {
      await fs.unlink(this.filePath);
    } catch (err) {
      if (!isNotFoundError(err)) throw err;
    }
  }

  private async write(): Promise<void> {
    const entries = this.readEntries()
      .map(toPersisted)
      .filter((entry): entry is PersistedEntry => entry !== null);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify({ version: FORMAT_VERSION, entries }, null, 2), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}

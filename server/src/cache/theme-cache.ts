/**
 * Theme Asset Cache
 *
 * The four stylesheets (base, popup, panel, widgets), read from the config
 * directory and checked before the UI gets them: valid UTF-8, balanced
 * braces. Invalidated by the config watcher when a theme file changes.
 */

import { constants } from 'fs';
import { access, copyFile, mkdir, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { CacheComputeError, THEME_ASSET_NAMES, getErrorMessage, isNotFoundError } from '@notiflux/core';
import type { ThemeAssetName, ThemePaths } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { ByteBudgetLru } from './lru-cache.js';

export const DEFAULT_THEME_DIR = join(__dirname, '..', '..', 'assets', 'theme');

export interface ThemeAsset {
  name: ThemeAssetName;
  path: string;
  css: string;
}

export interface ThemeBundle {
  assets: ThemeAsset[];
  errors: Array<{ name: ThemeAssetName; path: string; error: string }>;
}

export interface ThemeAssetCacheConfig {
  paths: ThemePaths;
  budgetBytes: number;
  negativeTtlMs?: number;
  maxBackoffMs?: number;
  readFile?: (path: string) => Promise<Uint8Array>;
  now?: () => number;
  logger?: Logger;
}

// ============================================================
// Validation
// ============================================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Position of the first unbalanced brace, or null. Comments and quoted
 * strings are skipped.
 */
export function findUnbalancedBrace(css: string): { line: number; message: string } | null {
  let depth = 0;
  let line = 1;
  let openLine = 1;
  for (let i = 0; i < css.length; i++) {
    const ch = css[i];
    if (ch === '\n') {
      line++;
    } else if (ch === '/' && css[i + 1] === '*') {
      const end = css.indexOf('*/', i + 2);
      if (end === -1) return { line, message: 'unterminated comment' };
      for (let j = i; j < end; j++) if (css[j] === '\n') line++;
      i = end + 1;
    } else if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < css.length && css[j] !== ch && css[j] !== '\n') {
        j += css[j] === '\\' ? 2 : 1;
      }
      if (j >= css.length || css[j] === '\n') return { line, message: 'unterminated string' };
      i = j;
    } else if (ch === '{') {
      if (depth === 0) openLine = line;
      depth++;
    } else if (ch === '}') {
      if (depth === 0) return { line, message: 'unexpected "}"' };
      depth--;
    }
  }
  return depth > 0 ? { line: openLine, message: 'unclosed "{"' } : null;
}

/**
 * Decode and check one stylesheet.
 * @throws Error describing the first problem
 */
export function validateStylesheet(bytes: Uint8Array): string {
  let css: string;
  try {
    css = utf8.decode(bytes);
  } catch {
    throw new Error('not valid UTF-8');
  }
  const problem = findUnbalancedBrace(css);
  if (problem) {
    throw new Error(`line ${problem.line}: ${problem.message}`);
  }
  return css;
}

// ============================================================
// Cache
// ============================================================

export class ThemeAssetCache {
  private cache: ByteBudgetLru<ThemeAsset>;
  private paths: ThemePaths;
  private read: (path: string) => Promise<Uint8Array>;

  constructor(config: ThemeAssetCacheConfig) {
    this.paths = { ...config.paths };
    this.read = config.readFile ?? ((path) => readFile(path));
    this.cache = new ByteBudgetLru<ThemeAsset>({
      name: 'theme',
      budgetBytes: config.budgetBytes,
      sizeOf: (asset) => Buffer.byteLength(asset.css),
      negativeTtlMs: config.negativeTtlMs,
      maxBackoffMs: config.maxBackoffMs,
      now: config.now,
      logger: config.logger,
    });
  }

  private key(name: ThemeAssetName): string {
    return `${name}:${this.paths[name]}`;
  }

  /**
   * Validated stylesheet.
   * @throws CacheComputeError when it is unreadable or malformed
   */
  load(name: ThemeAssetName): Promise<ThemeAsset> {
    const path = this.paths[name];
    return this.cache.getOrCompute(this.key(name), async () => {
      try {
        return { name, path, css: validateStylesheet(await this.read(path)) };
      } catch (err) {
        throw new CacheComputeError(path, `${name} stylesheet: ${getErrorMessage(err)}`, { cause: err });
      }
    });
  }

  /** Every stylesheet; failures are listed instead of thrown. */
  async loadAll(): Promise<ThemeBundle> {
    const bundle: ThemeBundle = { assets: [], errors: [] };
    const results = await Promise.allSettled(THEME_ASSET_NAMES.map((name) => this.load(name)));
    results.forEach((result, i) => {
      const name = THEME_ASSET_NAMES[i];
      if (result.status === 'fulfilled') {
        bundle.assets.push(result.value);
      } else {
        bundle.errors.push({ name, path: this.paths[name], error: getErrorMessage(result.reason) });
      }
    });
    return bundle;
  }

  /** Theme file names for a path, used to map file events to assets. */
  assetsAt(path: string): ThemeAssetName[] {
    return THEME_ASSET_NAMES.filter((name) => this.paths[name] === path);
  }

  invalidate(names: readonly ThemeAssetName[] = THEME_ASSET_NAMES): void {
    for (const name of names) {
      this.cache.invalidate(this.key(name));
    }
  }

  /** Apply reloaded config; assets whose path changed are dropped. */
  reconfigure(paths: ThemePaths, options: { budgetBytes: number; negativeTtlMs: number; maxBackoffMs: number }): void {
    const moved = THEME_ASSET_NAMES.filter((name) => this.paths[name] !== paths[name]);
    this.invalidate(moved);
    this.paths = { ...paths };
    this.cache.configure(options);
  }

  getPaths(): ThemePaths {
    return { ...this.paths };
  }
}

// ============================================================
// Defaults
// ============================================================

/**
 * Create missing theme files from the bundled defaults.
 * @returns the assets that were written
 */
export async function ensureThemeFiles(
  paths: ThemePaths,
  options: { defaultsDir?: string; logger?: Logger } = {},
): Promise<ThemeAssetName[]> {
  const defaultsDir = options.defaultsDir ?? DEFAULT_THEME_DIR;
  const logger = options.logger ?? createLogger({ silent: true });
  const written: ThemeAssetName[] = [];

  for (const name of THEME_ASSET_NAMES) {
    const target = paths[name];
    try {
      await access(target, constants.F_OK);
      continue;
    } catch (err) {
      if (!isNotFoundError(err)) throw err;
    }
    await mkdir(dirname(target), { recursive: true });
    await copyFile(join(defaultsDir, `${name}.css`), target, constants.COPYFILE_EXCL);
    logger.log(`Wrote default ${name} stylesheet to ${target}`);
    written.push(name);
  }
  return written;
}

/**
 * Icon Cache
 *
 * Decoded notification images, keyed by content fingerprint:
 *   files        path + mtime + size
 *   inline data  sha1 of the pixels + geometry
 * plus the requested pixel size.
 */

import { createHash } from 'crypto';
import { stat } from 'fs/promises';
import { fileURLToPath } from 'url';
import { CacheComputeError, getErrorMessage } from '@notiflux/core';
import type { ImageData, NotificationImage } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { ByteBudgetLru } from './lru-cache.js';
import type { CacheStats } from './lru-cache.js';
import { jimpDecoder } from './icon-decoder.js';
import type { DecodedIcon, IconDecoder } from './icon-decoder.js';

export const DEFAULT_ICON_SIZE = 64;

export interface IconCacheConfig {
  budgetBytes: number;
  negativeTtlMs?: number;
  maxBackoffMs?: number;
  decoder?: IconDecoder;
  now?: () => number;
  logger?: Logger;
}

/** Local filesystem path for an image reference, or null for anything else. */
export function localImagePath(reference: string): string | null {
  if (reference.startsWith('/')) {
    return reference;
  }
  if (reference.startsWith('file://')) {
    try {
      return fileURLToPath(reference);
    } catch {
      return null;
    }
  }
  return null;
}

/** Tightly packed RGBA from image data with an arbitrary rowstride. */
export function packRgba(image: ImageData): DecodedIcon {
  const { width, height } = image;
  const rowBytes = width * 4;
  if (image.channels !== 4 || image.bitsPerSample !== 8) {
    throw new Error(`unsupported image data: ${image.channels} channels, ${image.bitsPerSample} bits`);
  }
  if (image.rowstride === rowBytes && image.data.length === rowBytes * height) {
    return { width, height, data: image.data };
  }
  if (image.rowstride < rowBytes || image.rowstride * (height - 1) + rowBytes > image.data.length) {
    throw new Error(`image data too short for ${width}x${height}`);
  }
  const data = new Uint8Array(rowBytes * height);
  for (let y = 0; y < height; y++) {
    data.set(image.data.subarray(y * image.rowstride, y * image.rowstride + rowBytes), y * rowBytes);
  }
  return { width, height, data };
}

export class IconCache {
  private cache: ByteBudgetLru<DecodedIcon>;
  private decoder: IconDecoder;

  constructor(config: IconCacheConfig) {
    this.decoder = config.decoder ?? jimpDecoder;
    this.cache = new ByteBudgetLru<DecodedIcon>({
      name: 'icons',
      budgetBytes: config.budgetBytes,
      sizeOf: (icon) => icon.data.byteLength,
      negativeTtlMs: config.negativeTtlMs,
      maxBackoffMs: config.maxBackoffMs,
      now: config.now,
      logger: config.logger,
    });
  }

  /**
   * Decode an image file.
   * @throws CacheComputeError when the file is missing or undecodable
   */
  async loadFile(reference: string, size: number = DEFAULT_ICON_SIZE): Promise<DecodedIcon> {
    const path = localImagePath(reference);
    if (path === null) {
      throw new CacheComputeError(reference, 'not a local file');
    }
    let fingerprint: string;
    try {
      const info = await stat(path);
      fingerprint = `${path}:${info.mtimeMs}:${info.size}`;
    } catch (err) {
      throw new CacheComputeError(path, getErrorMessage(err), { cause: err });
    }
    return this.cache.getOrCompute(`file:${fingerprint}@${size}`, () => this.decoder.decodeFile(path, size));
  }

  /** Convert inline image data. */
  loadImageData(image: ImageData, size: number = DEFAULT_ICON_SIZE): Promise<DecodedIcon> {
    const digest = createHash('sha1').update(image.data).digest('hex');
    const key = `data:${digest}:${image.width}x${image.height}:${image.rowstride}@${size}`;
    return this.cache.getOrCompute(key, async () => {
      const packed = packRgba(image);
      return Math.max(packed.width, packed.height) > size ? this.decoder.scale(packed, size) : packed;
    });
  }

  /**
   * Bitmap for a notification: inline data first, then the image path.
   * Named theme icons are left to the UI, so those give null.
   */
  async loadForNotification(image: NotificationImage, size: number = DEFAULT_ICON_SIZE): Promise<DecodedIcon | null> {
    if (image.imageData) {
      return this.loadImageData(image.imageData, size);
    }
    if (image.imagePath !== '') {
      return this.loadFile(image.imagePath, size);
    }
    return null;
  }

  configure(options: { budgetBytes: number; negativeTtlMs: number; maxBackoffMs: number }): void {
    this.cache.configure(options);
  }

  clear(): void {
    this.cache.clear();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }
}

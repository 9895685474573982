/**
 * Hint decoding for the D-Bus adapter.
 *
 * dbus-next hands `a{sv}` over as a plain object of Variants. This turns it
 * into the bus-independent HintBag the rest of the daemon uses. Image
 * structures `(iiibiiay)` become ImageData; anything undecodable is dropped.
 */

import { Variant } from 'dbus-next';
import type { HintBag, HintValue, ImageData } from '@notiflux/core';

export const IMAGE_STRUCT_SIGNATURE = '(iiibiiay)';

function toBytes(value: unknown): Uint8Array | null {
  if (value instanceof Uint8Array) {
    // Buffer is a Uint8Array; copy so the hint does not pin the message buffer.
    return new Uint8Array(value);
  }
  if (Array.isArray(value) && value.every((item) => typeof item === 'number')) {
    return Uint8Array.from(value);
  }
  return null;
}

function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/** Decode the positional `(iiibiiay)` struct. Returns null on any shape mismatch. */
export function decodeImageStruct(value: unknown): ImageData | null {
  if (!Array.isArray(value) || value.length !== 7) {
    return null;
  }
  const [width, height, rowstride, hasAlpha, bitsPerSample, channels, data] = value;
  if (!isInt(width) || !isInt(height) || !isInt(rowstride) || !isInt(bitsPerSample) || !isInt(channels)) {
    return null;
  }
  if (typeof hasAlpha !== 'boolean') {
    return null;
  }
  const bytes = toBytes(data);
  if (!bytes) {
    return null;
  }
  return { width, height, rowstride, hasAlpha, bitsPerSample, channels, data: bytes };
}

function decodePlain(value: unknown): HintValue | null {
  if (value instanceof Variant) {
    return decodeVariant(value);
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return new Uint8Array(value);
  }
  if (Array.isArray(value)) {
    const items: HintValue[] = [];
    for (const item of value) {
      const decoded = decodePlain(item);
      if (decoded !== null) items.push(decoded);
    }
    return items;
  }
  return null;
}

/** Decode one hint variant. */
export function decodeVariant(variant: Variant): HintValue | null {
  const value: unknown = variant.value;
  if (variant.signature === IMAGE_STRUCT_SIGNATURE) {
    return decodeImageStruct(value);
  }
  if (variant.signature === 'ay') {
    return toBytes(value);
  }
  return decodePlain(value);
}

/**
 * Decode the `hints` argument of Notify.
 * @returns the decoded bag and the keys that were dropped
 */
export function decodeHints(raw: unknown): { hints: HintBag; dropped: string[] } {
  const hints: Record<string, HintValue> = {};
  const dropped: string[] = [];
  if (raw === null || typeof raw !== 'object') {
    return { hints, dropped };
  }
  for (const [key, entry] of Object.entries(raw)) {
    const decoded = entry instanceof Variant ? decodeVariant(entry) : null;
    if (decoded === null) {
      dropped.push(key);
    } else {
      hints[key] = decoded;
    }
  }
  return { hints, dropped };
}

/**
 * Hint parsing for incoming notifications.
 *
 * Every function here is total: malformed hint values are treated as absent
 * rather than rejected, matching how notification servers are expected to
 * tolerate sloppy senders.
 */

import { MAX_IMAGE_BYTES, MAX_IMAGE_DIMENSION } from './constants.js';
import { Urgency } from './types.js';
import type {
  HintBag,
  HintValue,
  ImageData,
  NotificationAction,
  NotificationImage,
  UrgencyName,
} from './types.js';

// ============================================================
// Scalar hints
// ============================================================

export function hintString(hints: HintBag, key: string): string | null {
  const value = hints[key];
  return typeof value === 'string' ? value : null;
}

export function hintNumber(hints: HintBag, key: string): number | null {
  const value = hints[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

/** Booleans may arrive as `b`, as an integer, or as text from scripts. */
export function hintBool(hints: HintBag, key: string): boolean {
  const value = hints[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  if (typeof value === 'string') return value === 'true' || value === '1';
  return false;
}

export function isUrgency(value: number): value is Urgency {
  return value === Urgency.Low || value === Urgency.Normal || value === Urgency.Critical;
}

/** Urgency from the `urgency` byte hint. Anything unrecognized is normal. */
export function urgencyFromHints(hints: HintBag): Urgency {
  const value = hintNumber(hints, 'urgency');
  return value !== null && isUrgency(value) ? value : Urgency.Normal;
}

export function urgencyName(urgency: Urgency): UrgencyName {
  switch (urgency) {
    case Urgency.Low:
      return 'low';
    case Urgency.Critical:
      return 'critical';
    default:
      return 'normal';
  }
}

export function parseUrgency(value: UrgencyName | number): Urgency | null {
  if (typeof value === 'number') {
    return isUrgency(value) ? value : null;
  }
  switch (value) {
    case 'low':
      return Urgency.Low;
    case 'normal':
      return Urgency.Normal;
    case 'critical':
      return Urgency.Critical;
    default:
      return null;
  }
}

// ============================================================
// Actions
// ============================================================

/**
 * Pair up the flat `[key, label, key, label, ...]` list.
 * A trailing key without a label is dropped.
 */
export function parseActions(flat: readonly string[]): NotificationAction[] {
  const actions: NotificationAction[] = [];
  for (let i = 0; i + 1 < flat.length; i += 2) {
    actions.push({ key: flat[i], label: flat[i + 1] });
  }
  return actions;
}

// ============================================================
// Images
// ============================================================

export function stripDesktopSuffix(value: string): string {
  return value.endsWith('.desktop') ? value.slice(0, -'.desktop'.length) : value;
}

export function isImageData(value: HintValue | undefined): value is ImageData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    'width' in value &&
    'data' in value
  );
}

function expandRgbToRgba(image: ImageData): ImageData | null {
  const width = Math.max(image.width, 1);
  const height = Math.max(image.height, 1);
  const rowstride = image.rowstride > 0 ? image.rowstride : width * 3;
  const rgba = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    const rowStart = y * rowstride;
    for (let x = 0; x < width; x++) {
      const src = rowStart + x * 3;
      if (src + 2 >= image.data.length) {
        return null;
      }
      const dst = (y * width + x) * 4;
      rgba[dst] = image.data[src];
      rgba[dst + 1] = image.data[src + 1];
      rgba[dst + 2] = image.data[src + 2];
      rgba[dst + 3] = 255;
    }
  }

  return {
    width: image.width,
    height: image.height,
    rowstride: width * 4,
    hasAlpha: true,
    bitsPerSample: image.bitsPerSample,
    channels: 4,
    data: rgba,
  };
}

/**
 * Bring 8-bit image data to RGBA. Other bit depths pass through untouched;
 * 8-bit data with an unsupported channel count is dropped.
 */
export function normalizeImageData(image: ImageData): ImageData | null {
  if (image.bitsPerSample !== 8) {
    return image;
  }
  switch (image.channels) {
    case 4:
      return image;
    case 3:
      return expandRgbToRgba(image);
    default:
      return null;
  }
}

export function isImageDataUsable(image: ImageData): boolean {
  if (image.width <= 0 || image.height <= 0) return false;
  if (image.width > MAX_IMAGE_DIMENSION || image.height > MAX_IMAGE_DIMENSION) return false;
  return image.data.length <= MAX_IMAGE_BYTES;
}

function firstImageData(hints: HintBag): ImageData | undefined {
  for (const key of ['image-data', 'image_data', 'icon_data']) {
    const raw = hints[key];
    if (!isImageData(raw)) continue;
    const normalized = normalizeImageData(raw);
    if (normalized) {
      return isImageDataUsable(normalized) ? normalized : undefined;
    }
  }
  return undefined;
}

/**
 * Resolve the image reference for a notification.
 *
 * Inline data wins, then an explicit image path, then an absolute app_icon.
 * The icon name comes from app_icon, then `desktop-entry`, then the app name.
 */
export function imageFromHints(appName: string, appIcon: string, hints: HintBag): NotificationImage {
  const imageData = firstImageData(hints);
  const appIconIsPath = appIcon.startsWith('/') || appIcon.startsWith('file://');

  let imagePath = hintString(hints, 'image-path') ?? hintString(hints, 'image_path') ?? '';
  if (imagePath === '' && appIconIsPath) {
    imagePath = appIcon;
  }

  const desktopEntry = hintString(hints, 'desktop-entry');
  let iconName = '';
  if (appIconIsPath) {
    iconName = '';
  } else if (appIcon !== '') {
    iconName = stripDesktopSuffix(appIcon);
  } else if (desktopEntry) {
    iconName = stripDesktopSuffix(desktopEntry);
  } else {
    iconName = appName;
  }

  return imageData ? { imageData, imagePath, iconName } : { imagePath, iconName };
}

/**
 * Drop inline pixels from a closed entry when a path or icon name still
 * identifies the image.
 */
export function imageForHistory(image: NotificationImage): NotificationImage {
  if (image.imageData && (image.imagePath !== '' || image.iconName !== '')) {
    return { imagePath: image.imagePath, iconName: image.iconName };
  }
  return image;
}

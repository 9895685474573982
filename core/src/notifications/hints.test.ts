/**
 * Hint parsing tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  Urgency,
  hintBool,
  urgencyFromHints,
  parseUrgency,
  parseActions,
  normalizeImageData,
  imageFromHints,
  imageForHistory,
} from './index.js';
import type { ImageData } from './index.js';

function rgbImage(width: number, height: number, fill: number): ImageData {
  return {
    width,
    height,
    rowstride: width * 3,
    hasAlpha: false,
    bitsPerSample: 8,
    channels: 3,
    data: new Uint8Array(width * height * 3).fill(fill),
  };
}

describe('urgencyFromHints', () => {
  it('reads the urgency byte', () => {
    expect(urgencyFromHints({ urgency: 0 })).toBe(Urgency.Low);
    expect(urgencyFromHints({ urgency: 2 })).toBe(Urgency.Critical);
  });

  it('treats missing or out-of-range values as normal', () => {
    expect(urgencyFromHints({})).toBe(Urgency.Normal);
    expect(urgencyFromHints({ urgency: 7 })).toBe(Urgency.Normal);
    expect(urgencyFromHints({ urgency: 'critical' })).toBe(Urgency.Normal);
  });
});

describe('parseUrgency', () => {
  it('accepts names and numbers', () => {
    expect(parseUrgency('critical')).toBe(Urgency.Critical);
    expect(parseUrgency(0)).toBe(Urgency.Low);
    expect(parseUrgency(3)).toBeNull();
  });
});

describe('hintBool', () => {
  it('accepts booleans, integers and text', () => {
    expect(hintBool({ transient: true }, 'transient')).toBe(true);
    expect(hintBool({ transient: 1 }, 'transient')).toBe(true);
    expect(hintBool({ transient: 'true' }, 'transient')).toBe(true);
    expect(hintBool({ transient: 'no' }, 'transient')).toBe(false);
    expect(hintBool({}, 'transient')).toBe(false);
  });
});

describe('parseActions', () => {
  it('pairs keys with labels and drops a dangling key', () => {
    expect(parseActions(['default', 'Open', 'reply', 'Reply', 'orphan'])).toEqual([
      { key: 'default', label: 'Open' },
      { key: 'reply', label: 'Reply' },
    ]);
  });
});

describe('normalizeImageData', () => {
  it('expands RGB to RGBA', () => {
    const image = normalizeImageData(rgbImage(2, 1, 9));
    expect(image).not.toBeNull();
    expect(image?.channels).toBe(4);
    expect(image?.rowstride).toBe(8);
    expect(Array.from(image?.data ?? [])).toEqual([9, 9, 9, 255, 9, 9, 9, 255]);
  });

  it('rejects truncated pixel buffers', () => {
    const image = rgbImage(2, 2, 1);
    expect(normalizeImageData({ ...image, data: image.data.slice(0, 6) })).toBeNull();
  });

  it('rejects unsupported 8-bit channel counts', () => {
    expect(normalizeImageData({ ...rgbImage(1, 1, 0), channels: 2 })).toBeNull();
  });
});

describe('imageFromHints', () => {
  it('prefers inline data and keeps the icon name', () => {
    const image = imageFromHints('mail', 'mail-client', { 'image-data': rgbImage(4, 4, 0) });
    expect(image.imageData?.width).toBe(4);
    expect(image.iconName).toBe('mail-client');
    expect(image.imagePath).toBe('');
  });

  it('ignores oversized inline images', () => {
    const image = imageFromHints('mail', '', { image_data: rgbImage(600, 1, 0) });
    expect(image.imageData).toBeUndefined();
    expect(image.iconName).toBe('mail');
  });

  it('uses an absolute app_icon as the image path', () => {
    expect(imageFromHints('mail', '/usr/share/icons/mail.png', {})).toEqual({
      imagePath: '/usr/share/icons/mail.png',
      iconName: '',
    });
  });

  it('prefers image-path over app_icon', () => {
    const image = imageFromHints('mail', 'file:///tmp/a.png', { 'image-path': '/tmp/b.png' });
    expect(image.imagePath).toBe('/tmp/b.png');
  });

  it('falls back to desktop-entry without its suffix', () => {
    const image = imageFromHints('Mail', '', { 'desktop-entry': 'org.example.Mail.desktop' });
    expect(image.iconName).toBe('org.example.Mail');
  });
});

describe('imageForHistory', () => {
  it('drops pixels when another reference remains', () => {
    const image = imageFromHints('mail', 'mail-client', { 'image-data': rgbImage(1, 1, 0) });
    expect(imageForHistory(image)).toEqual({ imagePath: '', iconName: 'mail-client' });
  });

  it('keeps pixels when they are the only reference', () => {
    const image = { imageData: rgbImage(1, 1, 0), imagePath: '', iconName: '' };
    expect(imageForHistory(image)).toBe(image);
  });
});

/**
 * Tests for hint decoding
 */

import { describe, it, expect } from '@jest/globals';
import { Variant } from 'dbus-next';
import { decodeHints, decodeImageStruct } from './hint-codec.js';

describe('decodeHints', () => {
  it('keeps scalar hints as their plain values', () => {
    const { hints, dropped } = decodeHints({
      urgency: new Variant('y', 2),
      category: new Variant('s', 'email.arrived'),
      transient: new Variant('b', true),
      value: new Variant('i', 42),
    });
    expect(hints).toEqual({ urgency: 2, category: 'email.arrived', transient: true, value: 42 });
    expect(dropped).toEqual([]);
  });

  it('decodes image structures into image data', () => {
    const pixels = Buffer.from([255, 0, 0, 255]);
    const { hints } = decodeHints({
      'image-data': new Variant('(iiibiiay)', [1, 1, 4, true, 8, 4, pixels]),
    });
    expect(hints['image-data']).toEqual({
      width: 1,
      height: 1,
      rowstride: 4,
      hasAlpha: true,
      bitsPerSample: 8,
      channels: 4,
      data: new Uint8Array([255, 0, 0, 255]),
    });
  });

  it('unwraps nested variants and arrays', () => {
    const { hints } = decodeHints({
      nested: new Variant('v', new Variant('s', 'inner')),
      list: new Variant('as', ['a', 'b']),
    });
    expect(hints.nested).toBe('inner');
    expect(hints.list).toEqual(['a', 'b']);
  });

  it('drops entries that are not decodable', () => {
    const { hints, dropped } = decodeHints({
      'image-data': new Variant('(iiibiiay)', [1, 1]),
      plain: 'not a variant',
      map: new Variant('a{sv}', { k: new Variant('s', 'v') }),
    });
    expect(hints).toEqual({});
    expect(dropped).toEqual(['image-data', 'plain', 'map']);
  });

  it('returns an empty bag for a missing argument', () => {
    expect(decodeHints(undefined)).toEqual({ hints: {}, dropped: [] });
  });
});

describe('decodeImageStruct', () => {
  it('rejects non-integer geometry', () => {
    expect(decodeImageStruct([1.5, 1, 4, true, 8, 4, Buffer.alloc(4)])).toBeNull();
    expect(decodeImageStruct([1, 1, 4, 1, 8, 4, Buffer.alloc(4)])).toBeNull();
  });
});

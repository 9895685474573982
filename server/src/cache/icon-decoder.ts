/**
 * Icon decoding with jimp.
 *
 * Everything leaves here as tightly packed 8-bit RGBA, scaled down so the
 * longer side is at most the requested size.
 */

import { Jimp } from 'jimp';

export interface DecodedIcon {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, no row padding. */
  data: Uint8Array;
}

export interface IconDecoder {
  decodeFile(path: string, size: number): Promise<DecodedIcon>;
  scale(icon: DecodedIcon, size: number): Promise<DecodedIcon>;
}

/** Target dimensions keeping the aspect ratio; never scales up. */
export function fitWithin(width: number, height: number, size: number): { width: number; height: number } {
  const longest = Math.max(width, height);
  if (longest <= size) {
    return { width, height };
  }
  const ratio = size / longest;
  return {
    width: Math.max(1, Math.round(width * ratio)),
    height: Math.max(1, Math.round(height * ratio)),
  };
}

/** The part of a jimp image used here. */
interface ResizableBitmap {
  bitmap: { width: number; height: number; data: Uint8Array };
  resize(options: { w: number; h: number }): unknown;
}

function toIcon(image: ResizableBitmap, size: number): DecodedIcon {
  const target = fitWithin(image.bitmap.width, image.bitmap.height, size);
  if (target.width !== image.bitmap.width || target.height !== image.bitmap.height) {
    image.resize({ w: target.width, h: target.height });
  }
  return {
    width: image.bitmap.width,
    height: image.bitmap.height,
    data: new Uint8Array(image.bitmap.data),
  };
}

export const jimpDecoder: IconDecoder = {
  async decodeFile(path, size) {
    const image = await Jimp.read(path);
    return toIcon(image, size);
  },

  async scale(icon, size) {
    const image = Jimp.fromBitmap({
      width: icon.width,
      height: icon.height,
      data: Buffer.from(icon.data),
    });
    return toIcon(image, size);
  },
};

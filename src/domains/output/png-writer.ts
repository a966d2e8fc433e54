import { open, rm } from 'node:fs/promises';
import { PNG } from 'pngjs';
import type { RawImage } from '../frame/types';

export interface WriteOptions {
  /** When false the file must not exist yet. */
  overwrite: boolean;
}

export interface ImageWriter {
  encodeAndWrite(path: string, image: RawImage, options: WriteOptions): Promise<void>;
}

/** Expands gray, RGB or RGBA pixels into the RGBA layout pngjs encodes. */
export function toPng(image: RawImage): PNG {
  const { width, height, channels, data } = image;
  const png = new PNG({ width, height });
  for (let p = 0; p < width * height; p++) {
    const i = p * channels;
    const o = p * 4;
    if (channels === 1) {
      png.data[o] = png.data[o + 1] = png.data[o + 2] = data[i];
      png.data[o + 3] = 255;
    } else {
      png.data[o] = data[i];
      png.data[o + 1] = data[i + 1];
      png.data[o + 2] = data[i + 2];
      png.data[o + 3] = channels === 4 ? data[i + 3] : 255;
    }
  }
  return png;
}

export function encodePng(image: RawImage): Buffer {
  return PNG.sync.write(toPng(image));
}

export class PngImageWriter implements ImageWriter {
  constructor(private readonly encode: (image: RawImage) => Buffer = encodePng) {}

  async encodeAndWrite(path: string, image: RawImage, options: WriteOptions): Promise<void> {
    const handle = await open(path, options.overwrite ? 'w' : 'wx');
    let written = false;
    try {
      await handle.writeFile(this.encode(image));
      written = true;
    } finally {
      await handle.close();
      if (!written) await rm(path, { force: true });
    }
  }
}

import type { Mask, Segmenter } from './types';
import type { RawImage } from '../../frame/types';
import type { Rgb } from '../../config/schema';
import { InferenceError } from '../../../core/errors';

const MAX_DISTANCE = Math.sqrt(3 * 255 * 255);

/**
 * Colour-distance segmenter: a pixel's background probability falls
 * linearly from 1 at the key colour to 0 at `tolerance` of the widest
 * possible RGB distance.
 */
export class ChromaKeySegmenter implements Segmenter {
  readonly name = 'chroma-key';
  private readonly radius: number;

  constructor(
    private readonly keyColor: Rgb,
    tolerance: number
  ) {
    if (!(tolerance > 0 && tolerance <= 1)) {
      throw new RangeError(`Chroma key tolerance must be in (0, 1], got ${tolerance}`);
    }
    this.radius = tolerance * MAX_DISTANCE;
  }

  segment(image: RawImage): Mask {
    if (image.channels !== 3 && image.channels !== 4) {
      throw new InferenceError(`Chroma key needs colour input, got ${image.channels} channel(s)`);
    }
    const { width, height, channels, data } = image;
    const [kr, kg, kb] = this.keyColor;
    const mask = new Float32Array(width * height);

    for (let p = 0; p < mask.length; p++) {
      const i = p * channels;
      const dr = data[i] - kr;
      const dg = data[i + 1] - kg;
      const db = data[i + 2] - kb;
      const distance = Math.sqrt(dr * dr + dg * dg + db * db);
      mask[p] = 1 - Math.min(1, distance / this.radius);
    }
    return { width, height, data: mask };
  }
}

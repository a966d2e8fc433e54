import type { BackgroundRemover, Mask, Segmenter } from './types';
import type { RawImage } from '../../frame/types';
import type { Rgb } from '../../config/schema';
import { isWellFormed } from '../../frame/frame';
import { InferenceError, ResourceExhaustedError, isPipelineError } from '../../../core/errors';

export interface CompositeOptions {
  /** Pixels whose background probability exceeds this are replaced. */
  threshold: number;
  backgroundColor: Rgb;
}

/** Replaces background pixels with a flat colour; alpha, if any, becomes opaque. */
export function compositeOverColor(image: RawImage, mask: Mask, options: CompositeOptions): RawImage {
  if (mask.width !== image.width || mask.height !== image.height || mask.data.length !== image.width * image.height) {
    throw new InferenceError(
      `Mask ${mask.width}x${mask.height} does not match image ${image.width}x${image.height}`
    );
  }
  const { channels } = image;
  const [br, bg, bb] = options.backgroundColor;
  const out = Uint8Array.from(image.data);

  for (let p = 0; p < mask.data.length; p++) {
    if (mask.data[p] <= options.threshold) continue;
    const i = p * channels;
    out[i] = br;
    out[i + 1] = bg;
    out[i + 2] = bb;
    if (channels === 4) out[i + 3] = 255;
  }
  return { width: image.width, height: image.height, channels, data: out };
}

/** Background remover built from a segmenter and a flat-colour composite. */
export class SegmentationBackgroundRemover implements BackgroundRemover {
  private disposed = false;

  constructor(
    private readonly segmenter: Segmenter,
    private readonly options: CompositeOptions
  ) {}

  get name(): string {
    return this.segmenter.name;
  }

  removeBackground(image: RawImage): RawImage {
    if (this.disposed) {
      throw new ResourceExhaustedError(`Background remover ${this.name} has been disposed`);
    }
    if (!isWellFormed(image)) {
      throw new InferenceError(
        `Malformed image: ${image.data.length} bytes for ${image.width}x${image.height}x${image.channels}`
      );
    }

    let mask: Mask;
    try {
      mask = this.segmenter.segment(image);
    } catch (e) {
      if (isPipelineError(e)) throw e;
      throw new InferenceError(`Segmentation failed in ${this.name}`, { cause: e });
    }
    return compositeOverColor(image, mask, this.options);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.segmenter.dispose?.();
  }
}

import type { RawImage } from '../../frame/types';

/** Per-pixel background probability in [0, 1], row-major. */
export interface Mask {
  width: number;
  height: number;
  data: Float32Array;
}

export interface Segmenter {
  readonly name: string;
  segment(image: RawImage): Mask;
  dispose?(): void;
}

/**
 * Synchronous background removal. Throws InferenceError for a frame it
 * cannot handle and ResourceExhaustedError once it can handle none.
 */
export interface BackgroundRemover {
  readonly name: string;
  removeBackground(image: RawImage): RawImage;
  dispose?(): void;
}

/** Interleaved 8-bit pixels, RGB channel order. */
export type ChannelCount = 1 | 3 | 4;

export interface RawImage {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  readonly data: Uint8Array;
}

/**
 * One captured image. Frames are frozen at construction and own a private
 * copy of their pixels, so nothing the camera does later can reach them.
 */
export interface Frame {
  /** Strictly increasing per producer, starting at 0. */
  readonly sequence: number;
  /** Milliseconds on a monotonic clock. */
  readonly capturedAt: number;
  readonly image: RawImage;
}

export interface StreamFormat {
  width: number;
  height: number;
  channels: ChannelCount;
}

import type { ChannelCount, Frame, RawImage } from './types';

export function isChannelCount(value: number): value is ChannelCount {
  return value === 1 || value === 3 || value === 4;
}

export function expectedByteLength(image: Pick<RawImage, 'width' | 'height' | 'channels'>): number {
  return image.width * image.height * image.channels;
}

/** True when the pixel buffer matches the declared geometry. */
export function isWellFormed(image: RawImage): boolean {
  return (
    Number.isInteger(image.width) && image.width > 0 &&
    Number.isInteger(image.height) && image.height > 0 &&
    image.data.length === expectedByteLength(image)
  );
}

export function freezeImage(image: RawImage): RawImage {
  return Object.freeze({
    width: image.width,
    height: image.height,
    channels: image.channels,
    data: image.data,
  });
}

/** Builds a frame around an image the caller already owns exclusively. */
export function createFrame(sequence: number, capturedAt: number, image: RawImage): Frame {
  if (!Number.isSafeInteger(sequence) || sequence < 0) {
    throw new RangeError(`Invalid frame sequence: ${sequence}`);
  }
  return Object.freeze({ sequence, capturedAt, image: freezeImage(image) });
}

/** Monotonic wall-clock-aligned milliseconds. */
export function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

/**
 * Stamps raw camera images as frames: next sequence number, monotonic
 * timestamp, and a copy of the pixels.
 */
export class FrameSequencer {
  private nextSequence: number;
  private lastTimestamp = Number.NEGATIVE_INFINITY;

  constructor(
    start = 0,
    private readonly clock: () => number = monotonicNow
  ) {
    this.nextSequence = start;
  }

  get issued(): number {
    return this.nextSequence;
  }

  next(raw: RawImage): Frame {
    // Clamp so a misbehaving clock source still yields non-decreasing stamps.
    const capturedAt = Math.max(this.clock(), this.lastTimestamp);
    this.lastTimestamp = capturedAt;
    const image: RawImage = {
      width: raw.width,
      height: raw.height,
      channels: raw.channels,
      data: Uint8Array.from(raw.data),
    };
    return createFrame(this.nextSequence++, capturedAt, image);
  }
}

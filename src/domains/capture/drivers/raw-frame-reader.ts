import type { RawImage, StreamFormat } from '../../frame/types';
import { expectedByteLength } from '../../frame/frame';
import { AcquisitionError } from '../../../core/errors';

interface Waiter {
  resolve: (image: RawImage) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Cuts a raw video byte stream into fixed-size images. Only the newest
 * complete image is held; a slow reader sees the latest picture, not a
 * backlog.
 */
export class RawFrameReader {
  private readonly frameSize: number;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private latest: RawImage | null = null;
  private waiters: Waiter[] = [];
  private failure: Error | null = null;
  private _skipped = 0;

  constructor(private readonly format: StreamFormat) {
    this.frameSize = expectedByteLength(format);
  }

  /** Images overwritten before anyone asked for them. */
  get skipped(): number {
    return this._skipped;
  }

  push(chunk: Buffer): void {
    if (this.failure) return;
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    if (this.buffered < this.frameSize) return;

    let all = Buffer.concat(this.chunks, this.buffered);
    while (all.length >= this.frameSize) {
      this.deliver({
        width: this.format.width,
        height: this.format.height,
        channels: this.format.channels,
        data: new Uint8Array(all.subarray(0, this.frameSize)),
      });
      all = all.subarray(this.frameSize);
    }
    this.chunks = all.length > 0 ? [all] : [];
    this.buffered = all.length;
  }

  private deliver(image: RawImage) {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(image);
      return;
    }
    if (this.latest) this._skipped++;
    this.latest = image;
  }

  /** Ends the stream; pending and future reads reject with `error`. */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }

  next(timeoutMs: number): Promise<RawImage> {
    const ready = this.latest;
    if (ready) {
      this.latest = null;
      return Promise.resolve(ready);
    }
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          reject(new AcquisitionError(`No frame within ${timeoutMs}ms`));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }
}

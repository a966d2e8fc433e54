import mitt, { type Emitter } from 'mitt';
import type { Frame } from '../frame/types';
import type { DrainPolicy } from '../config/schema';
import type { EnqueueOutcome, FrameChannel, FrameSource } from './types';

type BufferEvents = {
  dropped: { frame: Frame; cause: 'overflow' | 'discard' | 'closed' | 'out-of-order' };
};

/**
 * Fixed-capacity frame buffer with latest-frame-wins overflow: when full,
 * the oldest frame is evicted so the newest always fits. Delivery order is
 * strictly increasing by sequence; a frame at or below the last accepted
 * sequence is refused, so nothing is delivered twice.
 *
 * Only ever touched from one event loop, so no locking is needed.
 */
export class LatestFrameBuffer implements FrameChannel, FrameSource {
  public readonly events: Emitter<BufferEvents> = mitt<BufferEvents>();
  private frames: Frame[] = [];
  private waiters: ((frame: Frame | null) => void)[] = [];
  private closed = false;
  private _dropped = 0;
  private _lastSequence: number | null = null;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.frames.length;
  }

  /** Frames evicted, discarded or refused since construction. */
  get dropped(): number {
    return this._dropped;
  }

  /** Sequence of the newest accepted frame. */
  get lastSequence(): number | null {
    return this._lastSequence;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Buffered frames, oldest first. */
  snapshot(): readonly Frame[] {
    return [...this.frames];
  }

  tryEnqueue(frame: Frame): EnqueueOutcome {
    if (this.closed) {
      this.drop(frame, 'closed');
      return { status: 'rejected', reason: 'closed' };
    }
    if (this._lastSequence !== null && frame.sequence <= this._lastSequence) {
      this.drop(frame, 'out-of-order');
      return { status: 'rejected', reason: 'out-of-order' };
    }
    this._lastSequence = frame.sequence;

    // A consumer is parked only while the buffer is empty.
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
      return { status: 'accepted' };
    }

    this.frames.push(frame);
    if (this.frames.length > this.capacity) {
      const evicted = this.frames.shift();
      if (evicted) {
        this.drop(evicted, 'overflow');
        return { status: 'replaced', dropped: evicted };
      }
    }
    return { status: 'accepted' };
  }

  dequeue(): Promise<Frame | null> {
    const next = this.frames.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  close(mode: DrainPolicy): number {
    this.closed = true;
    let discarded = 0;
    if (mode === 'discard') {
      for (const frame of this.frames) this.drop(frame, 'discard');
      discarded = this.frames.length;
      this.frames = [];
    }
    // Parked consumers only exist when nothing is buffered.
    for (const waiter of this.waiters.splice(0)) waiter(null);
    return discarded;
  }

  async end(): Promise<void> {
    this.close('flush');
  }

  private drop(frame: Frame, cause: BufferEvents['dropped']['cause']) {
    this._dropped++;
    this.events.emit('dropped', { frame, cause });
  }
}

import type { Frame } from '../frame/types';
import type { DrainPolicy } from '../config/schema';

export type EnqueueOutcome =
  | { status: 'accepted' }
  /** Accepted; `dropped` was evicted to make room (latest-frame-wins). */
  | { status: 'replaced'; dropped: Frame }
  | { status: 'rejected'; reason: 'closed' | 'out-of-order' };

/** Producer side of the transport. `tryEnqueue` never blocks. */
export interface FrameChannel {
  tryEnqueue(frame: Frame): EnqueueOutcome;
  /** Stops intake and flushes what the channel owes its peer. */
  end(): Promise<void>;
}

/** Consumer side of the transport. */
export interface FrameSource {
  /**
   * Oldest buffered frame; waits while empty. Resolves `null` once the
   * source is closed and holds nothing more to deliver.
   */
  dequeue(): Promise<Frame | null>;
  /**
   * Refuses every later enqueue. `flush` keeps buffered frames for
   * delivery, `discard` drops them. Returns how many were discarded.
   */
  close(mode: DrainPolicy): number;
}

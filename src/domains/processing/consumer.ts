import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import mitt, { type Emitter } from 'mitt';
import type { FrameSource } from '../transport/types';
import type { BackgroundRemover } from './segmentation/types';
import type { OutputRecord, OutputSink } from '../output/output-sink';
import type { ShutdownCoordinator, StopRequest } from '../shutdown/coordinator';
import type { DrainPolicy } from '../config/schema';
import type { Frame, RawImage } from '../frame/types';
import { monotonicNow } from '../frame/frame';
import { ThroughputTracker } from '../observability/throughput';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import {
  InferenceError,
  ResourceExhaustedError,
  WriteError,
  describeError,
} from '../../core/errors';

export type ConsumerState = 'idle' | 'running' | 'draining' | 'terminated';

export interface ConsumerOptions {
  drainPolicy: DrainPolicy;
  statsInterval: number;
}

/** Reporting-only view of how far processing got. */
export interface ProcessingState {
  lastProcessedSequence: number | null;
  processed: number;
  failed: number;
  writeFailed: number;
  discarded: number;
  fps: number;
  /** Capture-to-output latency of the last processed frame, in ms. */
  lagMs: number;
}

export interface ConsumerReport extends ProcessingState {
  stop: StopRequest | null;
  /** Set when the background remover gave out; the process should exit non-zero. */
  error?: ResourceExhaustedError;
}

type ConsumerEvents = {
  state: ConsumerState;
  processed: OutputRecord;
  skipped: { sequence: number; error: InferenceError | WriteError };
};

/**
 * Processing loop: one frame at a time from the transport through background
 * removal into the output sink. Inference runs synchronously; the loop
 * yields a macrotask between frames so socket reads and signals get in.
 */
export class ProcessingConsumer {
  public readonly events: Emitter<ConsumerEvents> = mitt<ConsumerEvents>();
  private _state: ConsumerState = 'idle';
  private readonly throughput: ThroughputTracker;
  private readonly log: Logger;
  private readonly status: ProcessingState = {
    lastProcessedSequence: null,
    processed: 0,
    failed: 0,
    writeFailed: 0,
    discarded: 0,
    fps: 0,
    lagMs: 0,
  };

  constructor(
    private readonly source: FrameSource,
    private readonly remover: BackgroundRemover,
    private readonly sink: OutputSink,
    private readonly coordinator: ShutdownCoordinator,
    private readonly options: ConsumerOptions,
    logger: Logger = rootLogger,
    private readonly clock: () => number = monotonicNow
  ) {
    this.log = logger.child({ component: 'Consumer' });
    this.throughput = new ThroughputTracker(options.statsInterval);
  }

  get state(): ConsumerState {
    return this._state;
  }

  snapshot(): ProcessingState {
    return { ...this.status, fps: this.throughput.fps };
  }

  private transition(next: ConsumerState) {
    this._state = next;
    this.events.emit('state', next);
  }

  async run(): Promise<ConsumerReport> {
    if (this._state !== 'idle') {
      throw new Error(`Consumer already ${this._state}`);
    }
    this.transition('running');
    this.log.info(`Processing frames with ${this.remover.name}`, { drainPolicy: this.options.drainPolicy });

    const unsubscribe = this.coordinator.onStop((request) => this.drain(request));
    let failure: ResourceExhaustedError | undefined;
    try {
      failure = await this.loop();
    } finally {
      unsubscribe();
      // A stop that never came (source closed by its owner) still drains.
      if (this.state === 'running') this.transition('draining');
      this.transition('terminated');
    }

    const report: ConsumerReport = { ...this.snapshot(), stop: this.coordinator.request };
    this.log.info('Processing stopped', {
      processed: report.processed,
      failed: report.failed,
      writeFailed: report.writeFailed,
      discarded: report.discarded,
      lastSequence: report.lastProcessedSequence,
    });
    return failure ? { ...report, error: failure } : report;
  }

  private drain(request: StopRequest) {
    if (this._state !== 'running') return;
    this.transition('draining');
    const discarded = this.source.close(this.options.drainPolicy);
    this.status.discarded += discarded;
    this.log.info(`Draining after ${request.reason} stop`, { policy: this.options.drainPolicy, discarded });
  }

  private async loop(): Promise<ResourceExhaustedError | undefined> {
    for (;;) {
      const frame = await this.source.dequeue();
      if (!frame) return undefined;

      // Dequeued but not started: under `discard` only in-flight work finishes.
      if (this._state === 'draining' && this.options.drainPolicy === 'discard') {
        this.status.discarded++;
        return undefined;
      }

      const outcome = await this.process(frame);
      if (outcome instanceof ResourceExhaustedError) {
        this.log.error('Background remover exhausted', outcome);
        this.coordinator.requestStop('resource-exhausted');
        return outcome;
      }

      await yieldToEventLoop();
    }
  }

  private async process(frame: Frame): Promise<ResourceExhaustedError | null> {
    let image: RawImage;
    try {
      image = this.remover.removeBackground(frame.image);
    } catch (e) {
      if (e instanceof ResourceExhaustedError) return e;
      const error = e instanceof InferenceError
        ? e
        : new InferenceError(`Background removal failed: ${describeError(e)}`, { cause: e });
      this.status.failed++;
      this.log.warn(`Skipping frame ${frame.sequence}`, { error: describeError(error) });
      this.events.emit('skipped', { sequence: frame.sequence, error });
      return null;
    }

    let record: OutputRecord;
    try {
      record = await this.sink.write({ sequence: frame.sequence, capturedAt: frame.capturedAt, image });
    } catch (e) {
      if (!(e instanceof WriteError)) throw e;
      this.status.writeFailed++;
      this.log.error(`Could not save frame ${frame.sequence}`, e);
      this.events.emit('skipped', { sequence: frame.sequence, error: e });
      return null;
    }

    this.status.processed++;
    this.status.lastProcessedSequence = frame.sequence;
    this.status.lagMs = Math.max(0, this.clock() - frame.capturedAt);
    this.events.emit('processed', record);

    if (this.throughput.tick()) {
      this.log.info(
        `Processed ${this.throughput.count} frames | FPS: ${this.throughput.fps.toFixed(2)} | lag: ${this.status.lagMs.toFixed(0)}ms`,
        { lastSequence: frame.sequence }
      );
    }
    return null;
  }
}

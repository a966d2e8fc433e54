import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import mitt, { type Emitter } from 'mitt';
import type { Camera, Display, KeyPress } from './drivers/types';
import type { FrameChannel } from '../transport/types';
import type { ShutdownCoordinator, StopRequest } from '../shutdown/coordinator';
import type { Frame, RawImage } from '../frame/types';
import { FrameSequencer } from '../frame/frame';
import { ThroughputTracker } from '../observability/throughput';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import { AcquisitionError, describeError } from '../../core/errors';

export type ProducerState = 'idle' | 'running' | 'stopping' | 'terminated';

export interface ProducerOptions {
  stopKey: string;
  acquireTimeoutMs: number;
  statsInterval: number;
  maxFrames?: number;
  /** Keys are also polled on this interval, so a stalled camera cannot hide a stop key. */
  keyPollMs: number;
}

export interface ProducerReport {
  framesCaptured: number;
  framesEnqueued: number;
  framesDropped: number;
  stop: StopRequest | null;
  /** Set when the camera failed; the process should exit non-zero. */
  error?: AcquisitionError;
}

type ProducerEvents = {
  state: ProducerState;
  frame: Frame;
};

/**
 * Capture loop: camera → frame → transport, mirrored to the display.
 * Only the camera can make it fail; display and enqueue problems are logged
 * and the loop carries on.
 */
export class CaptureProducer {
  public readonly events: Emitter<ProducerEvents> = mitt<ProducerEvents>();
  private _state: ProducerState = 'idle';
  private readonly sequencer: FrameSequencer;
  private readonly throughput: ThroughputTracker;
  private readonly log: Logger;
  private enqueued = 0;
  private dropped = 0;
  private displayFailures = 0;
  private keyTimer?: NodeJS.Timeout;

  constructor(
    private readonly camera: Camera,
    private readonly display: Display,
    private readonly channel: FrameChannel,
    private readonly coordinator: ShutdownCoordinator,
    private readonly options: ProducerOptions,
    logger: Logger = rootLogger,
    sequencer: FrameSequencer = new FrameSequencer()
  ) {
    this.log = logger.child({ component: 'Producer' });
    this.sequencer = sequencer;
    this.throughput = new ThroughputTracker(options.statsInterval);
  }

  get state(): ProducerState {
    return this._state;
  }

  private transition(next: ProducerState) {
    this._state = next;
    this.events.emit('state', next);
  }

  async run(): Promise<ProducerReport> {
    if (this._state !== 'idle') {
      throw new Error(`Producer already ${this._state}`);
    }

    let failure: AcquisitionError | undefined;
    try {
      try {
        await this.camera.open();
      } catch (e) {
        throw e instanceof AcquisitionError
          ? e
          : new AcquisitionError(`Cannot open camera ${this.camera.id}`, { cause: e });
      }
      this.transition('running');
      this.log.info(`Capturing from ${this.camera.id}. Press '${this.options.stopKey}' to quit`);
      this.keyTimer = setInterval(() => this.checkKeys(), this.options.keyPollMs);
      await this.loop();
    } catch (e) {
      if (!(e instanceof AcquisitionError)) throw e;
      failure = e;
      this.log.error('Camera failed', e);
      this.coordinator.requestStop('acquisition-failure');
    } finally {
      await this.shutdown();
    }

    return {
      framesCaptured: this.throughput.count,
      framesEnqueued: this.enqueued,
      framesDropped: this.dropped,
      stop: this.coordinator.request,
      ...(failure ? { error: failure } : {}),
    };
  }

  private async loop(): Promise<void> {
    const stopped = this.coordinator.whenStopped().then(() => null);

    while (!this.coordinator.isStopRequested()) {
      const acquisition = this.camera.acquireFrame(this.options.acquireTimeoutMs);
      // A stop must not wait on the camera; a late failure is only logged then.
      acquisition.catch(e => {
        if (this.coordinator.isStopRequested()) {
          this.log.debug('Acquisition abandoned after stop', { error: describeError(e) });
        }
      });
      const raw = await Promise.race([acquisition, stopped]);
      if (raw === null || this.coordinator.isStopRequested()) break;

      const frame = this.sequencer.next(raw);
      this.events.emit('frame', frame);
      this.enqueue(frame);
      this.show(frame.image, frame.sequence);

      if (this.throughput.tick()) {
        this.log.info(`Sent ${this.throughput.count} frames | FPS: ${this.throughput.fps.toFixed(2)}`, {
          dropped: this.dropped,
        });
      }

      if (this.options.maxFrames !== undefined && this.throughput.count >= this.options.maxFrames) {
        this.log.info(`Reached max frames limit: ${this.options.maxFrames}`);
        this.coordinator.requestStop('frame-limit');
        break;
      }

      this.checkKeys();
      await yieldToEventLoop();
    }
  }

  private enqueue(frame: Frame) {
    try {
      const outcome = this.channel.tryEnqueue(frame);
      if (outcome.status === 'rejected') {
        this.dropped++;
        this.log.debug(`Frame ${frame.sequence} not sent (${outcome.reason})`);
      } else {
        this.enqueued++;
        if (outcome.status === 'replaced') this.dropped++;
      }
    } catch (e) {
      this.dropped++;
      this.log.warn(`Enqueue failed for frame ${frame.sequence}`, { error: describeError(e) });
    }
  }

  private show(image: RawImage, sequence: number) {
    try {
      this.display.show(image, sequence);
    } catch (e) {
      // First failure is worth a warning; repeats would flood the log.
      if (this.displayFailures++ === 0) {
        this.log.warn('Display failed', { error: describeError(e) });
      }
    }
  }

  private checkKeys() {
    if (this.coordinator.isStopRequested()) return;
    let key: KeyPress | null;
    while ((key = this.pollKey()) !== null) {
      if (key.ctrl && key.name === 'c') {
        this.coordinator.requestStop('interrupt');
        return;
      }
      if (!key.ctrl && key.name === this.options.stopKey) {
        this.log.info('User requested quit');
        this.coordinator.requestStop('operator');
        return;
      }
    }
  }

  private pollKey(): KeyPress | null {
    try {
      return this.display.pollKey();
    } catch (e) {
      this.log.warn('Key polling failed', { error: describeError(e) });
      return null;
    }
  }

  private async shutdown() {
    clearInterval(this.keyTimer);
    this.keyTimer = undefined;
    this.transition('stopping');

    try {
      await this.camera.release();
    } catch (e) {
      this.log.error(`Failed to release camera ${this.camera.id}`, e);
    }

    try {
      await this.channel.end();
    } catch (e) {
      this.log.warn('Failed to close transport cleanly', { error: describeError(e) });
    }

    try {
      this.display.close();
    } catch (e) {
      this.log.warn('Failed to close display', { error: describeError(e) });
    }

    this.transition('terminated');
    this.log.info('Capture stopped', {
      captured: this.throughput.count,
      enqueued: this.enqueued,
      dropped: this.dropped,
    });
  }
}

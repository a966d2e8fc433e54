import net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import mitt, { type Emitter } from 'mitt';
import { Protocol, PacketType, parseShutdown } from './protocol';
import { describeEndpoint, type Endpoint } from './endpoint';
import type { EnqueueOutcome, FrameChannel } from './types';
import type { Frame, StreamFormat } from '../frame/types';
import type { ShutdownCoordinator } from '../shutdown/coordinator';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import { ConnectionError } from '../../core/errors';

export interface FrameClientOptions {
  retries: number;
  retryDelayMs: number;
  /** Upper bound for `end()` waiting on the peer to close. */
  closeTimeoutMs: number;
}

type FrameClientEvents = {
  connected: void;
  disconnected: { expected: boolean };
  dropped: { frame: Frame };
};

/**
 * Capture-side endpoint. `tryEnqueue` writes straight to the socket while
 * the kernel buffer has room; under write backpressure the frame waits in a
 * single pending slot that newer frames overwrite, and is flushed on
 * `drain`. Capture therefore never waits on the processing process.
 */
export class FrameClient implements FrameChannel {
  public readonly events: Emitter<FrameClientEvents> = mitt<FrameClientEvents>();
  private socket: net.Socket | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pending: Frame | null = null;
  private lastSequence: number | null = null;
  private ended = false;
  private shutdownSent = false;
  private _sent = 0;
  private _dropped = 0;
  private readonly log: Logger;
  private unsubscribeStop: (() => void) | null = null;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly coordinator: ShutdownCoordinator,
    private readonly options: FrameClientOptions,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'FrameClient' });
  }

  get sent(): number {
    return this._sent;
  }

  get dropped(): number {
    return this._dropped;
  }

  /**
   * Connects, retrying refused or missing endpoints, then announces the
   * stream. Resolves `false` when a stop arrives before a connection is made.
   */
  async connect(format: StreamFormat): Promise<boolean> {
    const attempts = this.options.retries + 1;
    let lastError: unknown;
    const stopped = new AbortController();
    const unsubscribe = this.coordinator.onStop(() => stopped.abort());
    try {
      for (let attempt = 1; attempt <= attempts; attempt++) {
        if (this.coordinator.isStopRequested()) break;
        try {
          this.socket = await this.open();
          break;
        } catch (e) {
          lastError = e;
          if (attempt < attempts) {
            this.log.warn(`Connection refused. Retry ${attempt}/${this.options.retries}...`, {
              endpoint: describeEndpoint(this.endpoint),
            });
            await sleep(this.options.retryDelayMs, undefined, { signal: stopped.signal }).catch((err: unknown) => {
              if (!stopped.signal.aborted) throw err;
            });
          }
        }
      }
    } finally {
      unsubscribe();
    }

    if (!this.socket && this.coordinator.isStopRequested()) {
      this.log.info('Stop requested before connecting to processing process');
      return false;
    }

    const socket = this.socket;
    if (!socket) {
      throw new ConnectionError(
        `Cannot reach processing process at ${describeEndpoint(this.endpoint)}`,
        { cause: lastError }
      );
    }

    socket.on('data', (data) => this.handleData(data));
    socket.on('drain', () => this.flushPending());
    socket.on('error', (error) => this.log.error('Socket error', error));
    socket.on('close', () => this.handleClose());

    this.unsubscribeStop = this.coordinator.onStop(request => {
      if (request.origin === 'local') this.sendShutdown(request.reason);
    });

    socket.write(Protocol.encodeHello(format));
    this.log.info(`Connected to processing process at ${describeEndpoint(this.endpoint)}`);
    this.events.emit('connected');
    return true;
  }

  private open(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = this.endpoint.kind === 'unix'
        ? net.createConnection(this.endpoint.path)
        : net.createConnection(this.endpoint.port, this.endpoint.host);
      const onError = (error: Error) => {
        socket.destroy();
        reject(error);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  tryEnqueue(frame: Frame): EnqueueOutcome {
    const socket = this.socket;
    if (!socket || socket.destroyed || this.ended) {
      this.countDrop(frame);
      return { status: 'rejected', reason: 'closed' };
    }
    if (this.lastSequence !== null && frame.sequence <= this.lastSequence) {
      this.countDrop(frame);
      return { status: 'rejected', reason: 'out-of-order' };
    }
    this.lastSequence = frame.sequence;

    if (socket.writableNeedDrain) {
      const replaced = this.pending;
      this.pending = frame;
      if (replaced) {
        this.countDrop(replaced);
        return { status: 'replaced', dropped: replaced };
      }
      return { status: 'accepted' };
    }

    this.write(socket, frame);
    return { status: 'accepted' };
  }

  private write(socket: net.Socket, frame: Frame) {
    socket.write(Protocol.encodeFrame(frame));
    this._sent++;
  }

  private flushPending() {
    const socket = this.socket;
    const frame = this.pending;
    if (!socket || !frame || socket.destroyed || this.ended) return;
    this.pending = null;
    this.write(socket, frame);
  }

  private countDrop(frame: Frame) {
    this._dropped++;
    this.events.emit('dropped', { frame });
  }

  private handleData(data: Buffer) {
    this.buffer = Buffer.concat([this.buffer, data]);
    try {
      while (true) {
        const result = Protocol.decode(this.buffer);
        if (!result) break;
        const { packet, consumed } = result;
        this.buffer = this.buffer.subarray(consumed);
        if (packet.type === PacketType.SHUTDOWN) {
          const { reason } = parseShutdown(packet.payload);
          this.log.info(`Processing process requested shutdown (${reason})`);
          this.coordinator.requestStop('peer-request', 'peer');
        }
      }
    } catch (e) {
      this.log.error('Protocol error from processing process', e);
      this.socket?.destroy();
    }
  }

  private handleClose() {
    const expected = this.ended || this.coordinator.isStopRequested();
    this.socket = null;
    this.events.emit('disconnected', { expected });
    if (!expected) {
      this.log.warn('Processing process disconnected');
      this.coordinator.requestStop('peer-disconnected', 'peer');
    }
  }

  private sendShutdown(reason: string) {
    const socket = this.socket;
    if (!socket || socket.destroyed || this.shutdownSent) return;
    this.shutdownSent = true;
    // Anything still parked goes out ahead of the token so the peer can drain it.
    this.flushPending();
    socket.write(Protocol.encodeShutdown(reason));
  }

  /**
   * Stops intake, posts the shutdown token if this side initiated the stop,
   * half-closes, and waits for the peer to close (bounded).
   */
  async end(): Promise<void> {
    if (this.ended) return;
    const request = this.coordinator.request;
    if (request?.origin === 'local') this.sendShutdown(request.reason);
    this.ended = true;
    this.unsubscribeStop?.();
    this.unsubscribeStop = null;

    if (this.pending) {
      this.countDrop(this.pending);
      this.pending = null;
    }

    const socket = this.socket;
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.log.warn('Processing process did not close in time');
        socket.destroy();
      }, this.options.closeTimeoutMs);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }
}

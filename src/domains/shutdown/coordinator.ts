import mitt, { type Emitter } from 'mitt';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

export type StopReason =
  | 'operator'
  | 'interrupt'
  | 'terminate'
  | 'frame-limit'
  | 'acquisition-failure'
  | 'resource-exhausted'
  | 'peer-disconnected'
  | 'peer-request'
  | 'fatal';

/** `local` stops were decided in this process; `peer` ones arrived over the transport. */
export type StopOrigin = 'local' | 'peer';

export interface StopRequest {
  reason: StopReason;
  origin: StopOrigin;
  at: number;
}

type CoordinatorEvents = {
  stop: StopRequest;
};

export type StopListener = (request: StopRequest) => void;

/** Minimal surface of `process` used for signal wiring. */
export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Single-assignment stop signal. The first request wins and is broadcast to
 * every listener exactly once; later requests are no-ops. Safe to call from
 * signal handlers since it only flips state and emits synchronously.
 */
export class ShutdownCoordinator {
  private readonly events: Emitter<CoordinatorEvents> = mitt<CoordinatorEvents>();
  private _request: StopRequest | null = null;
  private readonly stopped: Promise<StopRequest>;
  private resolveStopped: (request: StopRequest) => void = () => {};
  private readonly log: Logger;

  constructor(
    logger: Logger = rootLogger,
    private readonly clock: () => number = Date.now
  ) {
    this.log = logger.child({ component: 'Shutdown' });
    this.stopped = new Promise(resolve => {
      this.resolveStopped = resolve;
    });
  }

  get request(): StopRequest | null {
    return this._request;
  }

  isStopRequested(): boolean {
    return this._request !== null;
  }

  /** Returns true only for the call that actually requested the stop. */
  requestStop(reason: StopReason, origin: StopOrigin = 'local'): boolean {
    if (this._request) return false;
    const request: StopRequest = { reason, origin, at: this.clock() };
    this._request = request;
    this.log.info(`Stop requested (${reason}, ${origin})`);
    this.resolveStopped(request);
    this.events.emit('stop', request);
    this.events.all.clear();
    return true;
  }

  /**
   * Runs `listener` once when stop is requested. If it already was, the
   * listener runs on the next microtask. Returns an unsubscribe function.
   */
  onStop(listener: StopListener): () => void {
    const guarded: StopListener = (request) => {
      try {
        listener(request);
      } catch (e) {
        this.log.error('Stop listener failed', e);
      }
    };

    const current = this._request;
    if (current) {
      let cancelled = false;
      queueMicrotask(() => {
        if (!cancelled) guarded(current);
      });
      return () => {
        cancelled = true;
      };
    }
    this.events.on('stop', guarded);
    return () => this.events.off('stop', guarded);
  }

  whenStopped(): Promise<StopRequest> {
    return this.stopped;
  }

  /** SIGINT → interrupt, SIGTERM → terminate. Returns a disposer. */
  installSignalHandlers(target: SignalTarget = process): () => void {
    const onInterrupt = () => {
      this.requestStop('interrupt');
    };
    const onTerminate = () => {
      this.requestStop('terminate');
    };
    target.on('SIGINT', onInterrupt);
    target.on('SIGTERM', onTerminate);
    return () => {
      target.off('SIGINT', onInterrupt);
      target.off('SIGTERM', onTerminate);
    };
  }
}

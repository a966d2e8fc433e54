import { setTimeout as sleep } from 'node:timers/promises';
import type { Camera } from './types';
import type { RawImage } from '../../frame/types';
import { AcquisitionError } from '../../../core/errors';

export interface MockCameraOptions {
  width: number;
  height: number;
  fps: number;
  /** Simulates the device vanishing after this many frames. */
  failAfter?: number;
  keyColor?: readonly [number, number, number];
}

const SUBJECT_COLOR = [200, 80, 60] as const;

/**
 * Mock camera for development and tests: paces frames at `fps` and paints a
 * square "subject" sliding across a key-coloured backdrop.
 */
export class MockCamera implements Camera {
  readonly id: string;
  private opened = false;
  private frameCount = 0;
  private nextFrameAt = 0;

  constructor(id: string, private readonly options: MockCameraOptions) {
    this.id = id;
  }

  get framesDelivered(): number {
    return this.frameCount;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    this.opened = true;
    this.nextFrameAt = performance.now();
  }

  async acquireFrame(timeoutMs: number): Promise<RawImage> {
    if (!this.opened) {
      throw new AcquisitionError(`Camera ${this.id} is not open`);
    }
    if (this.options.failAfter !== undefined && this.frameCount >= this.options.failAfter) {
      throw new AcquisitionError(`Camera ${this.id} stopped delivering frames`);
    }

    const waitMs = this.nextFrameAt - performance.now();
    if (waitMs > timeoutMs) {
      throw new AcquisitionError(`Camera ${this.id} timed out after ${timeoutMs}ms`);
    }
    if (waitMs > 0) await sleep(waitMs);
    if (!this.opened) {
      throw new AcquisitionError(`Camera ${this.id} was released`);
    }

    this.nextFrameAt = Math.max(this.nextFrameAt + 1000 / this.options.fps, performance.now());
    return this.render(this.frameCount++);
  }

  private render(index: number): RawImage {
    const { width, height } = this.options;
    const [kr, kg, kb] = this.options.keyColor ?? [0, 177, 64];
    const data = new Uint8Array(width * height * 3);
    const side = Math.max(1, Math.floor(Math.min(width, height) / 3));
    const left = (index * 4) % Math.max(1, width - side + 1);
    const top = Math.floor((height - side) / 2);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = (y * width + x) * 3;
        const inside = x >= left && x < left + side && y >= top && y < top + side;
        data[i] = inside ? SUBJECT_COLOR[0] : kr;
        data[i + 1] = inside ? SUBJECT_COLOR[1] : kg;
        data[i + 2] = inside ? SUBJECT_COLOR[2] : kb;
      }
    }
    return { width, height, channels: 3, data };
  }

  async release(): Promise<void> {
    this.opened = false;
  }
}

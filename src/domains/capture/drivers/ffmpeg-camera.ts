import { spawn, type ChildProcess } from 'node:child_process';
import type { Camera } from './types';
import type { RawImage } from '../../frame/types';
import { RawFrameReader } from './raw-frame-reader';
import { AcquisitionError } from '../../../core/errors';
import type { Logger } from '../../observability/types';
import { rootLogger } from '../../observability/logger';

export interface FfmpegCameraOptions {
  device: string;
  inputFormat: string;
  width: number;
  height: number;
  fps: number;
  /** ffmpeg executable; resolved through PATH by default. */
  command?: string;
}

/**
 * Reads a capture device through an `ffmpeg` child process emitting raw
 * rgb24 frames on stdout.
 */
export class FfmpegCamera implements Camera {
  readonly id: string;
  private proc: ChildProcess | null = null;
  private reader: RawFrameReader | null = null;
  private exited: Promise<void> = Promise.resolve();
  private stderrTail: string[] = [];
  private readonly log: Logger;

  constructor(private readonly options: FfmpegCameraOptions, logger: Logger = rootLogger) {
    this.id = options.device;
    this.log = logger.child({ component: 'FfmpegCamera' });
  }

  args(): string[] {
    const { inputFormat, fps, width, height, device } = this.options;
    return [
      '-hide_banner', '-loglevel', 'error',
      '-f', inputFormat,
      '-framerate', String(fps),
      '-video_size', `${width}x${height}`,
      '-i', device,
      '-f', 'rawvideo',
      '-pix_fmt', 'rgb24',
      '-',
    ];
  }

  async open(): Promise<void> {
    const reader = new RawFrameReader({ width: this.options.width, height: this.options.height, channels: 3 });
    const proc = spawn(this.options.command ?? 'ffmpeg', this.args(), { stdio: ['ignore', 'pipe', 'pipe'] });
    this.proc = proc;
    this.reader = reader;

    proc.stdout?.on('data', (chunk: Buffer) => reader.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => {
      const lines = chunk.toString('utf-8').split('\n').filter(Boolean);
      this.stderrTail = [...this.stderrTail, ...lines].slice(-5);
    });

    this.exited = new Promise(resolve => {
      proc.once('exit', (code, signal) => {
        this.proc = null;
        const detail = this.stderrTail.join(' | ');
        reader.fail(new AcquisitionError(
          `ffmpeg for ${this.id} exited (${signal ?? code})${detail ? `: ${detail}` : ''}`
        ));
        resolve();
      });
    });

    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => resolve());
      proc.once('error', (e) => {
        this.proc = null;
        reader.fail(new AcquisitionError(`Cannot start ffmpeg for ${this.id}`, { cause: e }));
        reject(new AcquisitionError(`Cannot start ffmpeg for ${this.id}`, { cause: e }));
      });
    });
    this.log.info(`Opened ${this.id} (${this.options.width}x${this.options.height} @ ${this.options.fps}fps)`);
  }

  acquireFrame(timeoutMs: number): Promise<RawImage> {
    if (!this.reader) {
      return Promise.reject(new AcquisitionError(`Camera ${this.id} is not open`));
    }
    return this.reader.next(timeoutMs);
  }

  async release(): Promise<void> {
    const proc = this.proc;
    if (proc) {
      proc.kill('SIGTERM');
      await this.exited;
    }
    this.reader = null;
    this.log.info(`Released ${this.id}`);
  }
}

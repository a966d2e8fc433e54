import { emitKeypressEvents } from 'node:readline';
import type { Display, KeyPress } from './types';
import type { RawImage } from '../../frame/types';

export interface TerminalDisplayOptions {
  /** Minimum interval between status line redraws. */
  refreshMs: number;
  /** Banner printed once on start, e.g. the stop key hint. */
  banner?: string;
  now?: () => number;
}

interface KeypressInfo {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

/** A readable keyboard source; a TTY gets switched to raw mode. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

const MAX_QUEUED_KEYS = 16;

/** Mean luma over a sparse pixel sample, enough for a live status line. */
export function sampleLuma(image: RawImage, step = 16): number {
  const { data, channels } = image;
  const pixels = Math.floor(data.length / channels);
  if (pixels === 0) return 0;
  let total = 0;
  let count = 0;
  for (let p = 0; p < pixels; p += step) {
    const i = p * channels;
    total += channels >= 3
      ? 0.299 * data[i] + 0.587 * data[i + 1] + 0.114 * data[i + 2]
      : data[i];
    count++;
  }
  return total / count;
}

/**
 * Terminal display: redraws a one-line preview status and collects
 * keypresses from a raw-mode TTY.
 */
export class TerminalDisplay implements Display {
  private keys: KeyPress[] = [];
  private lastDraw = Number.NEGATIVE_INFINITY;
  private readonly now: () => number;
  private readonly onKeypress = (_str: string | undefined, key: KeypressInfo | undefined) => {
    const name = key?.name ?? key?.sequence;
    if (!name) return;
    if (this.keys.length >= MAX_QUEUED_KEYS) this.keys.shift();
    this.keys.push({ name, ctrl: key?.ctrl ?? false });
  };

  constructor(
    private readonly input: KeyInput,
    private readonly output: NodeJS.WritableStream,
    private readonly options: TerminalDisplayOptions
  ) {
    this.now = options.now ?? (() => performance.now());
    emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode?.(true);
    input.on('keypress', this.onKeypress);
    input.resume();
    if (options.banner) output.write(`${options.banner}\n`);
  }

  show(image: RawImage, sequence: number): void {
    const now = this.now();
    if (now - this.lastDraw < this.options.refreshMs) return;
    this.lastDraw = now;
    const luma = sampleLuma(image).toFixed(0);
    this.output.write(`\r\x1b[2K#${sequence} ${image.width}x${image.height} luma ${luma}`);
  }

  pollKey(): KeyPress | null {
    return this.keys.shift() ?? null;
  }

  close(): void {
    this.input.off('keypress', this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write('\n');
  }
}

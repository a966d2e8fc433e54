import type { Display, KeyPress } from './types';
import type { RawImage } from '../../frame/types';

/** Display for non-interactive runs; stop comes from signals only. */
export class HeadlessDisplay implements Display {
  private shown = 0;

  get framesShown(): number {
    return this.shown;
  }

  show(_image: RawImage, _sequence: number): void {
    this.shown++;
  }

  pollKey(): KeyPress | null {
    return null;
  }

  close(): void {}
}

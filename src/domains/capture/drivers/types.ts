import type { RawImage } from '../../frame/types';

/**
 * Camera collaborator. The producer owns it exclusively between `open` and
 * `release`.
 */
export interface Camera {
  readonly id: string;
  /** Opens the device; failure is an AcquisitionError. */
  open(): Promise<void>;
  /** Next image; rejects with AcquisitionError on failure or after `timeoutMs`. */
  acquireFrame(timeoutMs: number): Promise<RawImage>;
  release(): Promise<void>;
}

export interface KeyPress {
  name: string;
  ctrl: boolean;
}

/** Display collaborator: shows frames and reports operator keys. */
export interface Display {
  show(image: RawImage, sequence: number): void;
  /** Oldest key pressed since the last poll, if any. */
  pollKey(): KeyPress | null;
  close(): void;
}

/**
 * Frame counter with a running rate, shared by both sides of the pipeline
 * for their periodic "N frames | FPS" lines.
 */
export class ThroughputTracker {
  private startedAt: number | null = null;
  private _count = 0;

  constructor(
    private readonly reportEvery: number,
    private readonly now: () => number = () => performance.now()
  ) {}

  get count(): number {
    return this._count;
  }

  /** Records one frame. Returns true when a periodic report is due. */
  tick(): boolean {
    if (this.startedAt === null) this.startedAt = this.now();
    this._count++;
    return this.reportEvery > 0 && this._count % this.reportEvery === 0;
  }

  /** Frames per second since the first tick. */
  get fps(): number {
    if (this.startedAt === null) return 0;
    const elapsedMs = this.now() - this.startedAt;
    return elapsedMs > 0 ? (this._count * 1000) / elapsedMs : 0;
  }

  get elapsedMs(): number {
    return this.startedAt === null ? 0 : this.now() - this.startedAt;
  }
}

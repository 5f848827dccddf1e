export interface TimelineScaleOptions {
  leftMargin: number;
  rightMargin: number;
  /** Narrowest the bar is allowed to get. */
  minWidth?: number;
}

/**
 * Maps frame indices to x positions on a progress bar and back,
 * for drawing timeline markers and scrubbing.
 */
export class TimelineScale {
  private totalFrames = 1;
  private barLeft: number;
  private barWidth = 0;

  constructor(private readonly options: TimelineScaleOptions) {
    this.barLeft = options.leftMargin;
  }

  setTotalFrames(totalFrames: number): void {
    this.totalFrames = Math.max(1, Math.floor(totalFrames));
  }

  resize(viewportWidth: number): void {
    const { leftMargin, rightMargin, minWidth = 100 } = this.options;
    this.barLeft = leftMargin;
    this.barWidth = Math.max(minWidth, viewportWidth - leftMargin - rightMargin);
  }

  get left(): number {
    return this.barLeft;
  }

  get width(): number {
    return this.barWidth;
  }

  frameToX(frame: number, clamp = true): number {
    const f = clamp ? Math.max(0, Math.min(frame, this.totalFrames)) : frame;
    return this.barLeft + (f / this.totalFrames) * this.barWidth;
  }

  /** Frame under `x`, clamped to a valid index. */
  xToFrame(x: number): number {
    if (this.barWidth <= 0) return 0;

    const progress = (x - this.barLeft) / this.barWidth;
    const frame = Math.trunc(progress * this.totalFrames);
    return Math.max(0, Math.min(frame, this.totalFrames - 1));
  }

  contains(x: number): boolean {
    return x >= this.barLeft && x <= this.barLeft + this.barWidth;
  }
}

/**
 * Exponential smoother whose baseline only moves on `commit`, so a caller can
 * post-process the blended value before it becomes the next baseline. The
 * weight is supplied per blend by whoever owns it.
 */
export class EmaFilter {
  private baseline = 0;

  blend(value: number, alpha: number): number {
    return alpha * value + (1 - alpha) * this.baseline;
  }

  commit(value: number): void {
    this.baseline = value;
  }

  current(): number {
    return this.baseline;
  }

  reset(): void {
    this.baseline = 0;
  }
}

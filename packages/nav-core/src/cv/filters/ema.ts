import type { ScalarFilter } from "./types";

export class EmaFilter implements ScalarFilter {
  private readonly alpha: number;
  private value: number | undefined;

  constructor(alpha: number) {
    if (!(alpha > 0 && alpha <= 1)) {
      throw new RangeError(`EMA alpha must be in (0, 1], got ${alpha}`);
    }
    this.alpha = alpha;
  }

  update(value: number): number {
    this.value = this.value === undefined ? value : this.value + this.alpha * (value - this.value);
    return this.value;
  }

  current(): number | undefined {
    return this.value;
  }

  reset(): void {
    this.value = undefined;
  }
}

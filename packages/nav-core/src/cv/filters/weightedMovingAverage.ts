import type { ScalarFilter } from "./types";

/**
 * Linear-weighted moving average: the i-th oldest sample in the window weighs i + 1.
 */
export class WeightedMovingAverage implements ScalarFilter {
  private readonly windowSize: number;
  private readonly history: number[] = [];

  constructor(windowSize: number) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Window size must be a positive integer, got ${windowSize}`);
    }
    this.windowSize = windowSize;
  }

  update(value: number): number {
    this.history.push(value);
    if (this.history.length > this.windowSize) {
      this.history.shift();
    }
    return this.average();
  }

  current(): number | undefined {
    return this.history.length === 0 ? undefined : this.average();
  }

  size(): number {
    return this.history.length;
  }

  reset(): void {
    this.history.length = 0;
  }

  private average(): number {
    let weightedSum = 0;
    let totalWeight = 0;
    this.history.forEach((sample, index) => {
      const weight = index + 1;
      weightedSum += sample * weight;
      totalWeight += weight;
    });
    return weightedSum / totalWeight;
  }
}

import { clamp } from "../../shared/env.js";

export default class EMASmoother {
  private readonly alpha: number;

  private value: number | null = null;

  constructor(alpha: number) {
    if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
      throw new RangeError(`alpha must be between 0.0 and 1.0 (got ${alpha})`);
    }
    this.alpha = alpha;
  }

  /** The first sample after construction or reset is taken as-is. */
  update(sample: number): number {
    if (this.value === null) {
      this.value = sample;
      return sample;
    }

    // Rounding must not push the blend outside its two inputs.
    this.value = clamp(
      this.alpha * sample + (1 - this.alpha) * this.value,
      Math.min(sample, this.value),
      Math.max(sample, this.value),
    );
    return this.value;
  }

  reset(): void {
    this.value = null;
  }

  getValue(): number | null {
    return this.value;
  }

  getAlpha(): number {
    return this.alpha;
  }
}

import { clamp } from "../../shared/env.js";
import type { EyeState } from "../../shared/types/frame.js";
import EMASmoother from "./ema-smoother.js";

export type EyeStateFilterOptions = {
  closeThreshold: number;
  enableFilter?: boolean;
  alpha?: number;
};

export type EyeFilterState = {
  isInitialized: boolean;
  filteredValue: number | null;
  alpha: number;
};

/**
 * Smooths one eye's openness and classifies it as open or closed.
 * A filtered value equal to the threshold counts as closed.
 */
export class EyeStateFilter {
  private readonly closeThreshold: number;

  private readonly enableFilter: boolean;

  private readonly smoother: EMASmoother;

  constructor(options: EyeStateFilterOptions) {
    const { closeThreshold, enableFilter = true, alpha = 0.3 } = options;
    if (
      !Number.isFinite(closeThreshold) ||
      closeThreshold < 0 ||
      closeThreshold > 1
    ) {
      throw new RangeError(
        `closeThreshold must be between 0.0 and 1.0 (got ${closeThreshold})`,
      );
    }

    this.closeThreshold = closeThreshold;
    this.enableFilter = enableFilter;
    this.smoother = new EMASmoother(alpha);
  }

  update(openRatio: number): EyeState {
    const normalised = clamp(openRatio, 0, 1);
    const filtered = this.enableFilter
      ? this.smoother.update(normalised)
      : normalised;

    return {
      isClosed: filtered <= this.closeThreshold,
      openRatio: normalised,
      filteredOpenRatio: filtered,
    };
  }

  reset(): void {
    this.smoother.reset();
  }

  getFilterState(): EyeFilterState {
    const filteredValue = this.smoother.getValue();
    return {
      isInitialized: filteredValue !== null,
      filteredValue,
      alpha: this.smoother.getAlpha(),
    };
  }
}

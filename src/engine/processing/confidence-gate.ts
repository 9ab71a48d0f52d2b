export type ConfidenceGateDecision = {
  allowUpdate: boolean;
  reason: "LOW_CONFIDENCE" | null;
};

/**
 * Rejects frames whose face confidence is strictly below the threshold.
 * NaN passes: missing values are the preprocessor's concern.
 */
export class ConfidenceGate {
  private readonly threshold: number;

  private skippedFrameCount = 0;

  constructor(threshold: number) {
    this.threshold = threshold;
  }

  evaluate(confidence: number): ConfidenceGateDecision {
    if (confidence < this.threshold) {
      this.skippedFrameCount += 1;
      return {
        allowUpdate: false,
        reason: "LOW_CONFIDENCE",
      };
    }

    this.skippedFrameCount = 0;
    return {
      allowUpdate: true,
      reason: null,
    };
  }

  /** Consecutive rejected frames; cleared by the next accepted frame. */
  getSkippedFrameCount(): number {
    return this.skippedFrameCount;
  }

  reset(): void {
    this.skippedFrameCount = 0;
  }
}

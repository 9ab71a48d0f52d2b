import { clamp } from "../../shared/env.js";
import type { FrameInput, ProcessedFrame } from "../../shared/types/frame.js";

type ScoreField = keyof ProcessedFrame;

const SCORE_FIELDS: readonly ScoreField[] = [
  "leftEyeOpen",
  "rightEyeOpen",
  "faceConfidence",
];

export type PreprocessorStatistics = {
  totalProcessed: number;
  nanCount: number;
  nanRate: number;
  hasLastValid: boolean;
};

export const createProcessedFrame = (
  values: Record<ScoreField, number>,
): ProcessedFrame => {
  SCORE_FIELDS.forEach((field) => {
    const value = values[field];
    if (!(value >= 0 && value <= 1)) {
      throw new RangeError(`${field} must be between 0.0 and 1.0 (got ${value})`);
    }
  });
  return Object.freeze({
    leftEyeOpen: values.leftEyeOpen,
    rightEyeOpen: values.rightEyeOpen,
    faceConfidence: values.faceConfidence,
  });
};

export class FramePreprocessor {
  private lastValid: ProcessedFrame | null = null;

  private nanCount = 0;

  private totalCount = 0;

  /**
   * NaN fields fall back to the last processed frame (0.0 before the
   * first one); every field is then clamped to [0, 1].
   */
  preprocess(frame: FrameInput): ProcessedFrame {
    this.totalCount += 1;

    const resolve = (field: ScoreField): number => {
      const value = frame[field];
      if (Number.isNaN(value)) {
        this.nanCount += 1;
        return this.lastValid?.[field] ?? 0;
      }
      return clamp(value, 0, 1);
    };

    const processed = createProcessedFrame({
      leftEyeOpen: resolve("leftEyeOpen"),
      rightEyeOpen: resolve("rightEyeOpen"),
      faceConfidence: resolve("faceConfidence"),
    });
    this.lastValid = processed;
    return processed;
  }

  reset(): void {
    this.lastValid = null;
    this.nanCount = 0;
    this.totalCount = 0;
  }

  getStatistics(): PreprocessorStatistics {
    return {
      totalProcessed: this.totalCount,
      nanCount: this.nanCount,
      nanRate: this.nanCount / Math.max(this.totalCount, 1),
      hasLastValid: this.lastValid !== null,
    };
  }
}

import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import type { VerdictRecord } from "../../shared/types/verdict.js";
import { formatSummary, summarizeVerdicts } from "../summary.js";

const plain = new Chalk({ level: 0 });

const verdict = (
  frameNum: number,
  isDrowsy: VerdictRecord["isDrowsy"],
  errorCode: VerdictRecord["errorCode"] = null,
): VerdictRecord => ({
  isDrowsy,
  frameNum,
  leftEyeClosed: isDrowsy === 1,
  rightEyeClosed: isDrowsy === 1,
  continuousTime: 0,
  errorCode,
});

describe("summarizeVerdicts", () => {
  it("counts verdicts by outcome and error code", () => {
    const summary = summarizeVerdicts([
      verdict(1, 0),
      verdict(2, 1),
      verdict(3, -1, "LOW_FACE_CONFIDENCE"),
      verdict(4, -1, "LOW_FACE_CONFIDENCE"),
      verdict(2, -1, "INVALID_FRAME_NUM"),
    ]);

    expect(summary).toEqual({
      totalFrames: 5,
      normalFrames: 1,
      drowsyFrames: 1,
      errorFrames: 3,
      errorsByCode: { LOW_FACE_CONFIDENCE: 2, INVALID_FRAME_NUM: 1 },
    });
  });
});

describe("formatSummary", () => {
  it("prints counts with percentages", () => {
    const lines = formatSummary(
      summarizeVerdicts([
        verdict(1, 0),
        verdict(2, 0),
        verdict(3, 1),
        verdict(4, -1, "INTERNAL_ERROR"),
      ]),
      plain,
    );

    expect(lines).toEqual([
      "=== Run summary ===",
      "Total frames: 4",
      "Normal frames: 2 (50.0%)",
      "Drowsy frames: 1 (25.0%)",
      "Error frames: 1 (25.0%)",
      "  INTERNAL_ERROR: 1",
      "Drowsiness detected!",
    ]);
  });

  it("handles an empty run", () => {
    expect(formatSummary(summarizeVerdicts([]), plain)).toEqual([
      "=== Run summary ===",
      "Total frames: 0",
      "Normal frames: 0 (0.0%)",
      "Drowsy frames: 0 (0.0%)",
      "Error frames: 0 (0.0%)",
    ]);
  });
});

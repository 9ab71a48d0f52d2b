import { describe, expect, it } from "vitest";
import {
  FramePreprocessor,
  createProcessedFrame,
} from "../processing/frame-preprocessor.js";
import { frame } from "./helpers.js";

describe("FramePreprocessor", () => {
  it("substitutes 0.0 for NaN before any frame was processed", () => {
    const preprocessor = new FramePreprocessor();

    const processed = preprocessor.preprocess(frame(1, Number.NaN, 0.6, 0.9));

    expect(processed).toEqual({
      leftEyeOpen: 0,
      rightEyeOpen: 0.6,
      faceConfidence: 0.9,
    });
    expect(preprocessor.getStatistics().nanCount).toBe(1);
  });

  it("substitutes the last processed value for NaN", () => {
    const preprocessor = new FramePreprocessor();
    preprocessor.preprocess(frame(1, 0.4, 0.5, 0.9));

    const processed = preprocessor.preprocess(
      frame(2, Number.NaN, Number.NaN, Number.NaN),
    );

    expect(processed).toEqual({
      leftEyeOpen: 0.4,
      rightEyeOpen: 0.5,
      faceConfidence: 0.9,
    });
    expect(preprocessor.getStatistics()).toEqual({
      totalProcessed: 2,
      nanCount: 3,
      nanRate: 1.5,
      hasLastValid: true,
    });
  });

  it("clamps values into [0, 1]", () => {
    const preprocessor = new FramePreprocessor();

    const processed = preprocessor.preprocess(frame(1, 1.5, -0.5, 2));

    expect(processed).toEqual({
      leftEyeOpen: 1,
      rightEyeOpen: 0,
      faceConfidence: 1,
    });
    expect(Object.isFrozen(processed)).toBe(true);
  });

  it("clears counters and the remembered frame on reset", () => {
    const preprocessor = new FramePreprocessor();
    preprocessor.preprocess(frame(1, 0.4, Number.NaN, 0.9));

    preprocessor.reset();

    expect(preprocessor.getStatistics()).toEqual({
      totalProcessed: 0,
      nanCount: 0,
      nanRate: 0,
      hasLastValid: false,
    });
    expect(preprocessor.preprocess(frame(2, Number.NaN, 0.5, 0.9)).leftEyeOpen).toBe(0);
  });
});

describe("createProcessedFrame", () => {
  it("rejects values outside [0, 1]", () => {
    expect(() =>
      createProcessedFrame({ leftEyeOpen: 1.2, rightEyeOpen: 0.5, faceConfidence: 0.9 }),
    ).toThrow(RangeError);
    expect(() =>
      createProcessedFrame({
        leftEyeOpen: 0.5,
        rightEyeOpen: Number.NaN,
        faceConfidence: 0.9,
      }),
    ).toThrow(RangeError);
  });
});

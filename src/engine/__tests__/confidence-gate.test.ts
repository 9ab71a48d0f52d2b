import { describe, expect, it } from "vitest";
import { ConfidenceGate } from "../processing/confidence-gate.js";

describe("ConfidenceGate", () => {
  it("allows confidence at or above the threshold", () => {
    const gate = new ConfidenceGate(0.7);

    expect(gate.evaluate(0.7)).toEqual({ allowUpdate: true, reason: null });
    expect(gate.evaluate(0.95).allowUpdate).toBe(true);
  });

  it("counts consecutive rejections until a frame is accepted", () => {
    const gate = new ConfidenceGate(0.7);

    expect(gate.evaluate(0.5)).toEqual({
      allowUpdate: false,
      reason: "LOW_CONFIDENCE",
    });
    gate.evaluate(0.2);
    expect(gate.getSkippedFrameCount()).toBe(2);

    gate.evaluate(0.9);
    expect(gate.getSkippedFrameCount()).toBe(0);
  });

  it("lets NaN through", () => {
    const gate = new ConfidenceGate(0.7);

    expect(gate.evaluate(Number.NaN).allowUpdate).toBe(true);
  });
});

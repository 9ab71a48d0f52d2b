import { vi } from "vitest";
import type { Logger } from "../../shared/logger.js";
import type { FrameInput } from "../../shared/types/frame.js";

export const createStubLogger = () =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(async () => undefined),
  }) satisfies Logger;

export const frame = (
  frameNum: number,
  leftEyeOpen: number,
  rightEyeOpen: number,
  faceConfidence = 0.95,
): FrameInput => ({
  frameNum,
  leftEyeOpen,
  rightEyeOpen,
  faceConfidence,
});

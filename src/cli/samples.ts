import { DEFAULT_DETECTOR_CONFIG } from "../engine/config/detector-config.js";
import {
  type ConfigFileRecord,
  type FrameInputRecord,
  toConfigFileRecord,
} from "../shared/validation/records.js";

export const createSampleConfig = (): ConfigFileRecord =>
  toConfigFileRecord(DEFAULT_DETECTOR_CONFIG);

const uniform = (random: () => number, min: number, max: number): number =>
  min + random() * (max - min);

/**
 * Frames numbered from 1. The first 10 frames of every 50 have both eyes
 * nearly closed; face confidence stays high throughout.
 */
export const createSampleInput = (
  numFrames: number,
  random: () => number = Math.random,
): FrameInputRecord[] => {
  if (!Number.isInteger(numFrames) || numFrames <= 0) {
    throw new RangeError(`frames must be a positive integer (got ${numFrames})`);
  }

  return Array.from({ length: numFrames }, (_, index) => {
    const closed = index % 50 < 10;
    const [min, max] = closed ? [0, 0.2] : [0.5, 1];
    return {
      frame_num: index + 1,
      left_eye_open: uniform(random, min, max),
      right_eye_open: uniform(random, min, max),
      face_confidence: uniform(random, 0.8, 1),
    };
  });
};

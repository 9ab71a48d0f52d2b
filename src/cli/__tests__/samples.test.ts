import { describe, expect, it } from "vitest";
import { DEFAULT_DETECTOR_CONFIG } from "../../engine/config/detector-config.js";
import { toConfigFileRecord } from "../../shared/validation/records.js";
import { createSampleConfig, createSampleInput } from "../samples.js";

describe("createSampleConfig", () => {
  it("mirrors the default detector configuration", () => {
    expect(createSampleConfig()).toEqual(toConfigFileRecord(DEFAULT_DETECTOR_CONFIG));
    expect(createSampleConfig()).toMatchObject({
      continuous_close_time: 1,
      enable_ema_filter: true,
      log_level: "info",
    });
  });
});

describe("createSampleInput", () => {
  it("closes the eyes for the first 10 frames of every 50", () => {
    const records = createSampleInput(60, () => 0);

    expect(records).toHaveLength(60);
    expect(records[0]).toEqual({
      frame_num: 1,
      left_eye_open: 0,
      right_eye_open: 0,
      face_confidence: 0.8,
    });
    expect(records[10]).toEqual({
      frame_num: 11,
      left_eye_open: 0.5,
      right_eye_open: 0.5,
      face_confidence: 0.8,
    });
    expect(records[50]?.left_eye_open).toBe(0);
  });

  it("keeps every score inside its band", () => {
    const records = createSampleInput(100);

    records.forEach((record, index) => {
      const closed = index % 50 < 10;
      expect(record.frame_num).toBe(index + 1);
      expect(record.left_eye_open).toBeGreaterThanOrEqual(closed ? 0 : 0.5);
      expect(record.left_eye_open).toBeLessThan(closed ? 0.2 : 1);
      expect(record.face_confidence).toBeGreaterThanOrEqual(0.8);
      expect(record.face_confidence).toBeLessThan(1);
    });
  });

  it.each([0, -3, 2.5])("rejects %s frames", (count) => {
    expect(() => createSampleInput(count)).toThrow(RangeError);
  });
});

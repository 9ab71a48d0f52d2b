import type { DetectorConfig, DetectorConfigOverrides } from "../../engine/config/detector-config.js";
import { type LogLevel, isLogLevel } from "../logger.js";
import type { FrameInput } from "../types/frame.js";
import type { DrowsyFlag, VerdictRecord } from "../types/verdict.js";

export type FrameInputRecord = {
  frame_num: number;
  left_eye_open: number;
  right_eye_open: number;
  face_confidence: number;
};

export type VerdictOutputRecord = {
  is_drowsy: DrowsyFlag;
  frame_num: number;
  left_eye_closed: boolean;
  right_eye_closed: boolean;
  continuous_time: number;
  error_code: string | null;
};

export type ConfigFileRecord = {
  left_eye_close_threshold: number;
  right_eye_close_threshold: number;
  continuous_close_time: number;
  face_conf_threshold: number;
  enable_ema_filter: boolean;
  ema_alpha: number;
  log_level: string;
};

export class FrameInputError extends Error {
  readonly index: number;

  constructor(index: number, message: string) {
    super(`Invalid input record at index ${index}: ${message}`);
    this.name = "FrameInputError";
    this.index = index;
  }
}

export class ConfigFileError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid configuration in ${source}: ${message}`);
    this.name = "ConfigFileError";
    this.source = source;
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

const SCORE_KEYS = ["left_eye_open", "right_eye_open", "face_confidence"] as const;

export const parseFrameInput = (value: unknown, index: number): FrameInput => {
  if (!isRecord(value)) {
    throw new FrameInputError(index, "expected an object");
  }

  const frameNum = value.frame_num;
  if (!isFiniteNumber(frameNum) || !Number.isInteger(frameNum) || frameNum < 0) {
    throw new FrameInputError(index, "frame_num must be a non-negative integer");
  }

  const scores: Record<(typeof SCORE_KEYS)[number], number> = {
    left_eye_open: 0,
    right_eye_open: 0,
    face_confidence: 0,
  };
  SCORE_KEYS.forEach((key) => {
    const score = value[key];
    if (!isFiniteNumber(score) || score < 0 || score > 1) {
      throw new FrameInputError(index, `${key} must be a number between 0.0 and 1.0`);
    }
    scores[key] = score;
  });

  return {
    frameNum,
    leftEyeOpen: scores.left_eye_open,
    rightEyeOpen: scores.right_eye_open,
    faceConfidence: scores.face_confidence,
  };
};

export const parseFrameInputs = (value: unknown): FrameInput[] => {
  if (!Array.isArray(value)) {
    throw new FrameInputError(-1, "expected an array of input records");
  }
  return value.map((entry: unknown, index) => parseFrameInput(entry, index));
};

export const toVerdictOutputRecord = (
  verdict: VerdictRecord,
): VerdictOutputRecord => ({
  is_drowsy: verdict.isDrowsy,
  frame_num: verdict.frameNum,
  left_eye_closed: verdict.leftEyeClosed,
  right_eye_closed: verdict.rightEyeClosed,
  continuous_time: verdict.continuousTime,
  error_code: verdict.errorCode,
});

const NUMERIC_CONFIG_KEYS = {
  left_eye_close_threshold: "leftEyeCloseThreshold",
  right_eye_close_threshold: "rightEyeCloseThreshold",
  continuous_close_time: "continuousCloseTime",
  face_conf_threshold: "faceConfThreshold",
  ema_alpha: "emaAlpha",
} as const satisfies Record<string, keyof DetectorConfig>;

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  critical: "fatal",
};

const parseLogLevel = (value: string): LogLevel | null => {
  const normalised = value.trim().toLowerCase();
  if (isLogLevel(normalised)) {
    return normalised;
  }
  return LOG_LEVEL_ALIASES[normalised] ?? null;
};

/**
 * Maps a snake_case configuration object onto config overrides. Unknown keys
 * are ignored; range checks happen when the config is created.
 */
export const parseConfigFile = (
  value: unknown,
  source: string,
): DetectorConfigOverrides => {
  if (!isRecord(value)) {
    throw new ConfigFileError(source, "expected a JSON object");
  }

  const overrides: DetectorConfigOverrides = {};

  Object.entries(NUMERIC_CONFIG_KEYS).forEach(([key, field]) => {
    const raw = value[key];
    if (raw === undefined) {
      return;
    }
    if (!isFiniteNumber(raw)) {
      throw new ConfigFileError(source, `${key} must be a number`);
    }
    overrides[field] = raw;
  });

  const enableEmaFilter = value.enable_ema_filter;
  if (enableEmaFilter !== undefined) {
    if (typeof enableEmaFilter !== "boolean") {
      throw new ConfigFileError(source, "enable_ema_filter must be a boolean");
    }
    overrides.enableEmaFilter = enableEmaFilter;
  }

  const logLevel = value.log_level;
  if (logLevel !== undefined) {
    const parsed = typeof logLevel === "string" ? parseLogLevel(logLevel) : null;
    if (parsed === null) {
      throw new ConfigFileError(source, "log_level is not a known level");
    }
    overrides.logLevel = parsed;
  }

  return overrides;
};

export const toConfigFileRecord = (
  config: Readonly<DetectorConfig>,
): ConfigFileRecord => ({
  left_eye_close_threshold: config.leftEyeCloseThreshold,
  right_eye_close_threshold: config.rightEyeCloseThreshold,
  continuous_close_time: config.continuousCloseTime,
  face_conf_threshold: config.faceConfThreshold,
  enable_ema_filter: config.enableEmaFilter,
  ema_alpha: config.emaAlpha,
  log_level: config.logLevel,
});

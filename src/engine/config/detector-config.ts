import {
  getEnvVar,
  parseNumericEnv,
  parseOptionalBoolean,
} from "../../shared/env.js";
import { type LogLevel, isLogLevel } from "../../shared/logger.js";

export type DetectorConfig = {
  /** Left eye counts as closed when its filtered openness is at or below this value. */
  leftEyeCloseThreshold: number;
  /** Right eye counts as closed when its filtered openness is at or below this value. */
  rightEyeCloseThreshold: number;
  /** Seconds of uninterrupted closure before a frame is flagged drowsy. */
  continuousCloseTime: number;
  /** Frames below this face confidence are rejected. */
  faceConfThreshold: number;
  enableEmaFilter: boolean;
  /** Weight of the newest sample in the EMA filter (0-1). */
  emaAlpha: number;
  logLevel: LogLevel;
};

export type DetectorConfigOverrides = Partial<DetectorConfig>;

export const CONTINUOUS_CLOSE_TIME_RANGE = { min: 0.1, max: 10 } as const;

export const DEFAULT_DETECTOR_CONFIG: Readonly<DetectorConfig> = Object.freeze({
  leftEyeCloseThreshold: 0.3,
  rightEyeCloseThreshold: 0.3,
  continuousCloseTime: 1.0,
  faceConfThreshold: 0.7,
  enableEmaFilter: true,
  emaAlpha: 0.3,
  logLevel: "info",
});

const ensureUnitInterval = (field: keyof DetectorConfig, value: number) => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${field} must be between 0.0 and 1.0 (got ${value})`);
  }
};

/** Throws a RangeError naming the first invalid field. */
export const validateDetectorConfig = (config: DetectorConfig): void => {
  ensureUnitInterval("leftEyeCloseThreshold", config.leftEyeCloseThreshold);
  ensureUnitInterval("rightEyeCloseThreshold", config.rightEyeCloseThreshold);
  ensureUnitInterval("faceConfThreshold", config.faceConfThreshold);
  ensureUnitInterval("emaAlpha", config.emaAlpha);

  const { min, max } = CONTINUOUS_CLOSE_TIME_RANGE;
  if (
    !Number.isFinite(config.continuousCloseTime) ||
    config.continuousCloseTime < min ||
    config.continuousCloseTime > max
  ) {
    throw new RangeError(
      `continuousCloseTime must be between ${min} and ${max} seconds (got ${config.continuousCloseTime})`,
    );
  }

  if (typeof config.enableEmaFilter !== "boolean") {
    throw new TypeError("enableEmaFilter must be a boolean");
  }

  if (!isLogLevel(config.logLevel)) {
    throw new RangeError(`logLevel is not a known level (got ${String(config.logLevel)})`);
  }
};

export const createDetectorEnvOverrides = (): DetectorConfigOverrides => {
  const overrides: DetectorConfigOverrides = {};

  const leftEyeCloseThreshold = parseNumericEnv(
    getEnvVar("DROWSY_LEFT_EYE_CLOSE_THRESHOLD"),
  );
  if (leftEyeCloseThreshold !== null) {
    overrides.leftEyeCloseThreshold = leftEyeCloseThreshold;
  }

  const rightEyeCloseThreshold = parseNumericEnv(
    getEnvVar("DROWSY_RIGHT_EYE_CLOSE_THRESHOLD"),
  );
  if (rightEyeCloseThreshold !== null) {
    overrides.rightEyeCloseThreshold = rightEyeCloseThreshold;
  }

  const continuousCloseTime = parseNumericEnv(
    getEnvVar("DROWSY_CONTINUOUS_CLOSE_TIME"),
  );
  if (continuousCloseTime !== null) {
    overrides.continuousCloseTime = continuousCloseTime;
  }

  const faceConfThreshold = parseNumericEnv(
    getEnvVar("DROWSY_FACE_CONF_THRESHOLD"),
  );
  if (faceConfThreshold !== null) {
    overrides.faceConfThreshold = faceConfThreshold;
  }

  const enableEmaFilter = parseOptionalBoolean(
    getEnvVar("DROWSY_ENABLE_EMA_FILTER"),
  );
  if (enableEmaFilter !== null) {
    overrides.enableEmaFilter = enableEmaFilter;
  }

  const emaAlpha = parseNumericEnv(getEnvVar("DROWSY_EMA_ALPHA"));
  if (emaAlpha !== null) {
    overrides.emaAlpha = emaAlpha;
  }

  const logLevel = getEnvVar("DROWSY_LOG_LEVEL")?.trim().toLowerCase();
  if (isLogLevel(logLevel)) {
    overrides.logLevel = logLevel;
  }

  return overrides;
};

const mergeDetectorConfig = (
  current: DetectorConfig,
  overrides?: DetectorConfigOverrides,
): DetectorConfig => {
  if (!overrides) {
    return { ...current };
  }
  const merged: DetectorConfig = { ...current };
  // Explicit undefined in an override keeps the current value.
  Object.entries(overrides).forEach(([key, value]) => {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  });
  return merged;
};

export type CreateDetectorConfigOptions = {
  /** Skip DROWSY_* environment overrides. */
  ignoreEnv?: boolean;
};

/**
 * Builds a validated, frozen config: defaults, then DROWSY_* environment
 * overrides, then the given overrides.
 */
export const createDetectorConfig = (
  overrides: DetectorConfigOverrides = {},
  options: CreateDetectorConfigOptions = {},
): Readonly<DetectorConfig> => {
  const envOverrides = options.ignoreEnv ? {} : createDetectorEnvOverrides();
  const config = mergeDetectorConfig(
    mergeDetectorConfig({ ...DEFAULT_DETECTOR_CONFIG }, envOverrides),
    overrides,
  );
  validateDetectorConfig(config);
  return Object.freeze(config);
};

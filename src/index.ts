export {
  CONTINUOUS_CLOSE_TIME_RANGE,
  DEFAULT_DETECTOR_CONFIG,
  createDetectorConfig,
  createDetectorEnvOverrides,
  validateDetectorConfig,
} from "./engine/config/detector-config.js";
export type {
  CreateDetectorConfigOptions,
  DetectorConfig,
  DetectorConfigOverrides,
} from "./engine/config/detector-config.js";
export {
  DEFAULT_FRAME_RATE,
  DrowsinessEvaluator,
  createDrowsinessEvaluator,
} from "./engine/detection/index.js";
export type {
  CreateEvaluatorOptions,
  DrowsinessEvaluatorOptions,
  DrowsinessStatistics,
  PhaseTransitionEvent,
} from "./engine/detection/index.js";
export { ConfidenceGate } from "./engine/processing/confidence-gate.js";
export { default as EMASmoother } from "./engine/processing/ema-smoother.js";
export { EyeStateFilter } from "./engine/processing/eye-state-filter.js";
export type {
  EyeFilterState,
  EyeStateFilterOptions,
} from "./engine/processing/eye-state-filter.js";
export {
  FramePreprocessor,
  createProcessedFrame,
} from "./engine/processing/frame-preprocessor.js";
export type { PreprocessorStatistics } from "./engine/processing/frame-preprocessor.js";
export { ContinuousTimer } from "./engine/timing/continuous-timer.js";
export { LOG_LEVELS, createLogger, toErrorPayload } from "./shared/logger.js";
export type { LogLevel, Logger, LoggerMetadata } from "./shared/logger.js";
export type {
  EyeState,
  FrameInput,
  ProcessedFrame,
  TimerState,
} from "./shared/types/frame.js";
export type {
  DrowsinessErrorCode,
  DrowsinessPhase,
  DrowsyFlag,
  VerdictRecord,
} from "./shared/types/verdict.js";
export {
  ConfigFileError,
  FrameInputError,
  parseConfigFile,
  parseFrameInput,
  parseFrameInputs,
  toConfigFileRecord,
  toVerdictOutputRecord,
} from "./shared/validation/records.js";
export type {
  ConfigFileRecord,
  FrameInputRecord,
  VerdictOutputRecord,
} from "./shared/validation/records.js";

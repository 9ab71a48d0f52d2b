import {
  type CreateDetectorConfigOptions,
  type DetectorConfigOverrides,
  createDetectorConfig,
} from "../config/detector-config.js";
import {
  DrowsinessEvaluator,
  type DrowsinessEvaluatorOptions,
} from "./drowsiness-evaluator.js";

export type CreateEvaluatorOptions = DrowsinessEvaluatorOptions &
  CreateDetectorConfigOptions;

/**
 * Resolves a config from defaults, DROWSY_* environment variables and the
 * given overrides, then builds an evaluator on it.
 */
export const createDrowsinessEvaluator = (
  overrides: DetectorConfigOverrides = {},
  options: CreateEvaluatorOptions = {},
): DrowsinessEvaluator => {
  const { ignoreEnv, ...evaluatorOptions } = options;
  const config = createDetectorConfig(overrides, { ignoreEnv });
  return new DrowsinessEvaluator(config, evaluatorOptions);
};

export {
  DEFAULT_FRAME_RATE,
  DrowsinessEvaluator,
} from "./drowsiness-evaluator.js";
export type {
  DrowsinessEvaluatorOptions,
  DrowsinessStatistics,
  PhaseTransitionEvent,
} from "./drowsiness-evaluator.js";

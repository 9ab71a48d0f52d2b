import { type Logger, createLogger, toErrorPayload } from "../../shared/logger.js";
import type { FrameInput } from "../../shared/types/frame.js";
import type {
  DrowsinessErrorCode,
  DrowsinessPhase,
  DrowsyFlag,
  VerdictRecord,
} from "../../shared/types/verdict.js";
import {
  type DetectorConfig,
  validateDetectorConfig,
} from "../config/detector-config.js";
import { ConfidenceGate } from "../processing/confidence-gate.js";
import {
  type EyeFilterState,
  EyeStateFilter,
} from "../processing/eye-state-filter.js";
import {
  FramePreprocessor,
  type PreprocessorStatistics,
} from "../processing/frame-preprocessor.js";
import { ContinuousTimer } from "../timing/continuous-timer.js";

export const DEFAULT_FRAME_RATE = 30;

export type PhaseTransitionEvent = {
  from: DrowsinessPhase;
  to: DrowsinessPhase;
  frameNum: number;
  continuousTime: number;
};

export type DrowsinessEvaluatorOptions = {
  logger?: Logger;
  frameRate?: number;
  preprocessor?: FramePreprocessor;
  onTransition?: (event: PhaseTransitionEvent) => void;
  /** Receives the exception behind every INTERNAL_ERROR verdict. */
  onInternalError?: (error: unknown, frameNum: number) => void;
};

export type DrowsinessStatistics = {
  readonly lastFrameNum: number;
  readonly phase: DrowsinessPhase;
  readonly timerActive: boolean;
  readonly currentContinuousTime: number;
  readonly remainingTime: number;
  readonly frameRate: number;
  readonly lowConfidenceStreak: number;
  readonly dataProcessor: Readonly<PreprocessorStatistics>;
  readonly leftEyeFilter: Readonly<EyeFilterState>;
  readonly rightEyeFilter: Readonly<EyeFilterState>;
};

const assertFrameRate = (fps: number): void => {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new RangeError(`Frame rate must be positive (got ${fps})`);
  }
};

const createErrorVerdict = (
  frameNum: number,
  errorCode: DrowsinessErrorCode,
): VerdictRecord =>
  Object.freeze({
    isDrowsy: -1,
    frameNum,
    leftEyeClosed: false,
    rightEyeClosed: false,
    continuousTime: 0,
    errorCode,
  });

/**
 * Per-frame drowsiness state machine for a single eye-pair stream.
 *
 * `update` never throws: out-of-order frames, low face confidence and
 * internal failures are reported as verdicts with `isDrowsy = -1`.
 * Rejected frames never advance the last accepted frame number.
 */
export class DrowsinessEvaluator {
  private readonly config: Readonly<DetectorConfig>;

  private readonly logger: Logger;

  private readonly leftEye: EyeStateFilter;

  private readonly rightEye: EyeStateFilter;

  private readonly timer: ContinuousTimer;

  private readonly preprocessor: FramePreprocessor;

  private readonly gate: ConfidenceGate;

  private readonly onTransition?: (event: PhaseTransitionEvent) => void;

  private readonly onInternalError?: (error: unknown, frameNum: number) => void;

  private frameRate: number;

  private lastFrameNum = -1;

  private lastValidResult: VerdictRecord | null = null;

  private phase: DrowsinessPhase = "IDLE";

  constructor(
    config: Readonly<DetectorConfig>,
    options: DrowsinessEvaluatorOptions = {},
  ) {
    validateDetectorConfig(config);
    this.config = Object.freeze({ ...config });
    this.logger =
      options.logger ??
      createLogger({
        module: "drowsiness-evaluator",
        level: this.config.logLevel,
      });

    const frameRate = options.frameRate ?? DEFAULT_FRAME_RATE;
    assertFrameRate(frameRate);
    this.frameRate = frameRate;

    this.leftEye = new EyeStateFilter({
      closeThreshold: this.config.leftEyeCloseThreshold,
      enableFilter: this.config.enableEmaFilter,
      alpha: this.config.emaAlpha,
    });
    this.rightEye = new EyeStateFilter({
      closeThreshold: this.config.rightEyeCloseThreshold,
      enableFilter: this.config.enableEmaFilter,
      alpha: this.config.emaAlpha,
    });
    this.timer = new ContinuousTimer(this.config.continuousCloseTime);
    this.preprocessor = options.preprocessor ?? new FramePreprocessor();
    this.gate = new ConfidenceGate(this.config.faceConfThreshold);
    this.onTransition = options.onTransition;
    this.onInternalError = options.onInternalError;

    this.logger.info("DrowsinessEvaluator initialised", {
      config: { ...this.config },
      frameRate: this.frameRate,
    });
  }

  update(frame: FrameInput): VerdictRecord {
    const { frameNum } = frame;

    if (!(frameNum > this.lastFrameNum)) {
      this.logger.warn("Rejected out-of-order frame", {
        frameNum,
        lastFrameNum: this.lastFrameNum,
      });
      return createErrorVerdict(frameNum, "INVALID_FRAME_NUM");
    }

    const decision = this.gate.evaluate(frame.faceConfidence);
    if (!decision.allowUpdate) {
      this.logger.debug("Low face confidence, resetting eye state", {
        frameNum,
        faceConfidence: frame.faceConfidence,
        threshold: this.config.faceConfThreshold,
        skippedFrames: this.gate.getSkippedFrameCount(),
      });
      this.resetEyeState();
      this.syncPhase(frameNum);
      return createErrorVerdict(frameNum, "LOW_FACE_CONFIDENCE");
    }

    const startedAt = performance.now();
    let result: VerdictRecord;
    try {
      result = this.evaluate(frame);
    } catch (error) {
      this.logger.error("Frame evaluation failed", {
        frameNum,
        error: toErrorPayload(error),
      });
      this.reportInternalError(error, frameNum);
      this.syncPhase(frameNum);
      return createErrorVerdict(frameNum, "INTERNAL_ERROR");
    }

    this.lastFrameNum = frameNum;
    this.lastValidResult = result;

    this.logger.debug("Frame evaluated", {
      frameNum,
      isDrowsy: result.isDrowsy,
      leftEyeClosed: result.leftEyeClosed,
      rightEyeClosed: result.rightEyeClosed,
      continuousTime: Number(result.continuousTime.toFixed(3)),
      durationMs: Number((performance.now() - startedAt).toFixed(3)),
    });

    this.syncPhase(frameNum);
    return result;
  }

  reset(): void {
    this.resetEyeState();
    this.preprocessor.reset();
    this.gate.reset();
    this.lastFrameNum = -1;
    this.lastValidResult = null;
    this.phase = "IDLE";
    this.logger.info("DrowsinessEvaluator reset");
  }

  setFrameRate(fps: number): void {
    assertFrameRate(fps);
    this.frameRate = fps;
    this.logger.info("Frame rate updated", { frameRate: fps });
  }

  getFrameRate(): number {
    return this.frameRate;
  }

  getConfig(): Readonly<DetectorConfig> {
    return this.config;
  }

  getLastValidResult(): VerdictRecord | null {
    return this.lastValidResult;
  }

  getPhase(): DrowsinessPhase {
    return this.phase;
  }

  getStatistics(): DrowsinessStatistics {
    return Object.freeze({
      lastFrameNum: this.lastFrameNum,
      phase: this.phase,
      timerActive: this.timer.isActive(),
      currentContinuousTime: this.timer.getCurrentDuration(),
      remainingTime: this.timer.getRemainingTime(),
      frameRate: this.frameRate,
      lowConfidenceStreak: this.gate.getSkippedFrameCount(),
      dataProcessor: Object.freeze(this.preprocessor.getStatistics()),
      leftEyeFilter: Object.freeze(this.leftEye.getFilterState()),
      rightEyeFilter: Object.freeze(this.rightEye.getFilterState()),
    });
  }

  private evaluate(frame: FrameInput): VerdictRecord {
    const processed = this.preprocessor.preprocess(frame);
    const left = this.leftEye.update(processed.leftEyeOpen);
    const right = this.rightEye.update(processed.rightEyeOpen);

    let isDrowsy: DrowsyFlag = 0;
    if (left.isClosed && right.isClosed) {
      if (!this.timer.isActive()) {
        this.timer.start();
      }
      this.timer.update(1 / this.frameRate);
      isDrowsy = this.timer.isThresholdExceeded() ? 1 : 0;
    } else {
      this.timer.stop();
    }

    return Object.freeze({
      isDrowsy,
      frameNum: frame.frameNum,
      leftEyeClosed: left.isClosed,
      rightEyeClosed: right.isClosed,
      continuousTime: this.timer.getCurrentDuration(),
      errorCode: null,
    });
  }

  // Preprocessor statistics span the whole session and are kept here.
  private resetEyeState(): void {
    this.timer.stop();
    this.leftEye.reset();
    this.rightEye.reset();
  }

  private resolvePhase(): DrowsinessPhase {
    if (!this.timer.isActive()) {
      return "IDLE";
    }
    return this.timer.isThresholdExceeded() ? "DROWSY" : "ACCUMULATING";
  }

  private syncPhase(frameNum: number): void {
    const next = this.resolvePhase();
    if (next === this.phase) {
      return;
    }

    const event: PhaseTransitionEvent = {
      from: this.phase,
      to: next,
      frameNum,
      continuousTime: this.timer.getCurrentDuration(),
    };
    this.phase = next;

    this.logger.info("Drowsiness phase transition", {
      from: event.from,
      to: event.to,
      frameNum,
      continuousTime: Number(event.continuousTime.toFixed(3)),
    });

    try {
      this.onTransition?.(event);
    } catch (err) {
      this.logger.warn("Phase transition callback threw", {
        error: toErrorPayload(err),
      });
    }
  }

  private reportInternalError(error: unknown, frameNum: number): void {
    try {
      this.onInternalError?.(error, frameNum);
    } catch (err) {
      this.logger.warn("Internal error callback threw", {
        error: toErrorPayload(err),
      });
    }
  }
}

export type DrowsinessErrorCode =
  | "INVALID_FRAME_NUM"
  | "LOW_FACE_CONFIDENCE"
  | "INTERNAL_ERROR";

/** -1 error, 0 not drowsy, 1 drowsy. */
export type DrowsyFlag = -1 | 0 | 1;

export type VerdictRecord = {
  readonly isDrowsy: DrowsyFlag;
  readonly frameNum: number;
  readonly leftEyeClosed: boolean;
  readonly rightEyeClosed: boolean;
  readonly continuousTime: number;
  readonly errorCode: DrowsinessErrorCode | null;
};

export type DrowsinessPhase = "IDLE" | "ACCUMULATING" | "DROWSY";

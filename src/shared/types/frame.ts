export type FrameInput = {
  /** Non-negative, strictly increasing within a session. */
  frameNum: number;
  leftEyeOpen: number;
  rightEyeOpen: number;
  faceConfidence: number;
};

export type ProcessedFrame = {
  readonly leftEyeOpen: number;
  readonly rightEyeOpen: number;
  readonly faceConfidence: number;
};

export type EyeState = {
  isClosed: boolean;
  openRatio: number;
  filteredOpenRatio: number;
};

export type TimerState = {
  isActive: boolean;
  currentDuration: number;
};

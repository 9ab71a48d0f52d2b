import type { TimerState } from "../../shared/types/frame.js";

/**
 * Accumulates caller-supplied time deltas while active. Stopping discards
 * the accumulated duration; there is no pause.
 */
export class ContinuousTimer {
  private readonly threshold: number;

  private state: TimerState = {
    isActive: false,
    currentDuration: 0,
  };

  constructor(thresholdSeconds: number) {
    if (!Number.isFinite(thresholdSeconds) || thresholdSeconds <= 0) {
      throw new RangeError(
        `threshold must be positive (got ${thresholdSeconds})`,
      );
    }
    this.threshold = thresholdSeconds;
  }

  start(): void {
    this.state = { isActive: true, currentDuration: 0 };
  }

  stop(): void {
    this.state = { isActive: false, currentDuration: 0 };
  }

  reset(): void {
    this.stop();
  }

  update(deltaSeconds: number): number {
    if (!this.state.isActive) {
      return 0;
    }
    if (!(deltaSeconds >= 0)) {
      throw new RangeError(`dt must be non-negative (got ${deltaSeconds})`);
    }

    this.state.currentDuration += deltaSeconds;
    return this.state.currentDuration;
  }

  isThresholdExceeded(): boolean {
    return this.state.currentDuration >= this.threshold;
  }

  getRemainingTime(): number {
    if (!this.state.isActive) {
      return this.threshold;
    }
    return Math.max(0, this.threshold - this.state.currentDuration);
  }

  getCurrentDuration(): number {
    return this.state.currentDuration;
  }

  isActive(): boolean {
    return this.state.isActive;
  }

  getThreshold(): number {
    return this.threshold;
  }

  getState(): TimerState {
    return { ...this.state };
  }
}

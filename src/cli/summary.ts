import chalk, { type ChalkInstance } from "chalk";
import type { DrowsinessErrorCode, VerdictRecord } from "../shared/types/verdict.js";

export type RunSummary = {
  totalFrames: number;
  normalFrames: number;
  drowsyFrames: number;
  errorFrames: number;
  errorsByCode: Partial<Record<DrowsinessErrorCode, number>>;
};

export const summarizeVerdicts = (
  verdicts: readonly VerdictRecord[],
): RunSummary => {
  const summary: RunSummary = {
    totalFrames: verdicts.length,
    normalFrames: 0,
    drowsyFrames: 0,
    errorFrames: 0,
    errorsByCode: {},
  };

  verdicts.forEach((verdict) => {
    if (verdict.isDrowsy === 1) {
      summary.drowsyFrames += 1;
      return;
    }
    if (verdict.isDrowsy === -1) {
      summary.errorFrames += 1;
      if (verdict.errorCode !== null) {
        summary.errorsByCode[verdict.errorCode] =
          (summary.errorsByCode[verdict.errorCode] ?? 0) + 1;
      }
      return;
    }
    summary.normalFrames += 1;
  });

  return summary;
};

const percentage = (count: number, total: number): string => {
  if (total === 0) {
    return "0.0%";
  }
  return `${((count / total) * 100).toFixed(1)}%`;
};

export const formatSummary = (
  summary: RunSummary,
  colors: ChalkInstance = chalk,
): string[] => {
  const { totalFrames } = summary;
  const lines = [
    colors.bold("=== Run summary ==="),
    `Total frames: ${totalFrames}`,
    `Normal frames: ${summary.normalFrames} (${percentage(summary.normalFrames, totalFrames)})`,
    colors.yellow(
      `Drowsy frames: ${summary.drowsyFrames} (${percentage(summary.drowsyFrames, totalFrames)})`,
    ),
    colors.red(
      `Error frames: ${summary.errorFrames} (${percentage(summary.errorFrames, totalFrames)})`,
    ),
  ];

  Object.entries(summary.errorsByCode).forEach(([code, count]) => {
    lines.push(`  ${code}: ${count}`);
  });

  if (summary.drowsyFrames > 0) {
    lines.push(colors.bgRed.whiteBright.bold("Drowsiness detected!"));
  }

  return lines;
};

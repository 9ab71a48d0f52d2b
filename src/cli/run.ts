import { parseArgs } from "node:util";
import chalk from "chalk";
import { createDetectorConfig } from "../engine/config/detector-config.js";
import { DrowsinessEvaluator } from "../engine/detection/drowsiness-evaluator.js";
import { createLogger, toErrorPayload } from "../shared/logger.js";
import type { VerdictRecord } from "../shared/types/verdict.js";
import {
  parseConfigFile,
  parseFrameInputs,
  toVerdictOutputRecord,
} from "../shared/validation/records.js";
import { readJsonFile, writeJsonFile } from "./io.js";
import { createSampleConfig, createSampleInput } from "./samples.js";
import { captureCliException, flushCliSentry, initCliSentry } from "./sentry.js";
import { formatSummary, summarizeVerdicts } from "./summary.js";

export const USAGE = `Usage: drowsy-detect --input <frames.json> [options]

Options:
  --input <file>                 JSON array of input records
  --config <file>                JSON configuration file
  --output <file>                Write output records to this file
  --fps <n>                      Frame rate of the input (default 30)
  -v, --verbose                  Debug logging and detector statistics
  --create-sample-config <file>  Write the default configuration and exit
  --create-sample-input <file>   Write generated input records and exit
  --frames <n>                   Number of generated frames (default 100)
  -h, --help                     Show this help`;

const PREVIEW_RECORDS = 10;
const DEFAULT_SAMPLE_FRAMES = 100;
const PROGRESS_INTERVAL = 100;

export type CliIO = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  random?: () => number;
};

/* eslint-disable no-console */
const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};
/* eslint-enable no-console */

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      input: { type: "string" },
      config: { type: "string" },
      output: { type: "string" },
      fps: { type: "string" },
      verbose: { type: "boolean", short: "v" },
      "create-sample-config": { type: "string" },
      "create-sample-input": { type: "string" },
      frames: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

const parseNumberOption = (name: string, raw: string): number => {
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new RangeError(`--${name} must be a number (got "${raw}")`);
  }
  return value;
};

/** Runs the CLI and resolves with the process exit code. */
export const runCli = async (
  argv: string[],
  io: CliIO = defaultIO,
): Promise<number> => {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    io.stderr(chalk.red(`Error: ${toErrorPayload(error).message}`));
    io.stderr(USAGE);
    return 1;
  }

  const { values } = args;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const logger = createLogger({
    module: "cli",
    level: values.verbose ? "debug" : "info",
  });

  try {
    const sampleConfigPath = values["create-sample-config"];
    if (sampleConfigPath !== undefined) {
      await writeJsonFile(sampleConfigPath, createSampleConfig());
      io.stdout(`Sample configuration file created: ${sampleConfigPath}`);
      return 0;
    }

    const sampleInputPath = values["create-sample-input"];
    if (sampleInputPath !== undefined) {
      const frames = parseNumberOption(
        "frames",
        values.frames ?? String(DEFAULT_SAMPLE_FRAMES),
      );
      const records = createSampleInput(frames, io.random);
      await writeJsonFile(sampleInputPath, records);
      io.stdout(
        `Sample input file created: ${sampleInputPath} (${records.length} frames)`,
      );
      return 0;
    }

    const inputPath = values.input;
    if (inputPath === undefined) {
      io.stderr(chalk.red("Error: --input is required"));
      io.stderr(USAGE);
      return 1;
    }

    const fileOverrides =
      values.config !== undefined
        ? parseConfigFile(await readJsonFile(values.config), values.config)
        : {};
    const config = createDetectorConfig({
      ...fileOverrides,
      ...(values.verbose ? { logLevel: "debug" as const } : {}),
    });

    await initCliSentry(logger);

    const evaluator = new DrowsinessEvaluator(config, {
      logger: createLogger({
        module: "drowsiness-evaluator",
        level: config.logLevel,
      }),
      frameRate:
        values.fps !== undefined
          ? parseNumberOption("fps", values.fps)
          : undefined,
      onInternalError: captureCliException,
    });

    const frames = parseFrameInputs(await readJsonFile(inputPath));
    io.stdout(`Loaded ${frames.length} frames from ${inputPath}`);

    const verdicts: VerdictRecord[] = [];
    frames.forEach((frame, index) => {
      verdicts.push(evaluator.update(frame));
      const processed = index + 1;
      if (processed % PROGRESS_INTERVAL === 0 || processed === frames.length) {
        io.stdout(`Processed ${processed}/${frames.length} frames`);
      }
    });

    const outputRecords = verdicts.map(toVerdictOutputRecord);
    if (values.output !== undefined) {
      await writeJsonFile(values.output, outputRecords);
      io.stdout(`Results saved to: ${values.output}`);
    } else {
      io.stdout(`=== Results (first ${PREVIEW_RECORDS}) ===`);
      outputRecords.slice(0, PREVIEW_RECORDS).forEach((record) => {
        io.stdout(JSON.stringify(record));
      });
      if (outputRecords.length > PREVIEW_RECORDS) {
        io.stdout(`... and ${outputRecords.length - PREVIEW_RECORDS} more results`);
      }
    }

    formatSummary(summarizeVerdicts(verdicts)).forEach((line) => io.stdout(line));

    if (values.verbose) {
      io.stdout("=== Detector statistics ===");
      io.stdout(JSON.stringify(evaluator.getStatistics(), null, 2));
    }

    return 0;
  } catch (error) {
    logger.error("drowsy-detect failed", { error: toErrorPayload(error) });
    captureCliException(error);
    io.stderr(chalk.red(`Error: ${toErrorPayload(error).message}`));
    return 1;
  } finally {
    await flushCliSentry();
    await logger.flush();
  }
};

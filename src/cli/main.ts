#!/usr/bin/env node
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";
import { runCli } from "./run.js";

dotenvExpand.expand(dotenv.config());

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exitCode = 1;
  });

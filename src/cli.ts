#!/usr/bin/env node

import { runCli } from "./cli/program.js";
import { createRuntime } from "./runtime.js";
import { logger } from "./logger.js";

runCli(process.argv, {
  createRouter: (configPath) => createRuntime({ configPath }).router,
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ error: err }, "Fatal error");
    process.exitCode = 1;
  },
);

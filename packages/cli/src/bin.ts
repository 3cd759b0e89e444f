#!/usr/bin/env node
import { formatConfigError } from "./config.js";
import { runCli } from "./index.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatConfigError(error));
    process.exitCode = 1;
  });

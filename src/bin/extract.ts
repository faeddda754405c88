#!/usr/bin/env node
import { runExtract } from "../cli/extract";
import { errorMessage } from "../services/errors";

runExtract(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 1;
  }
);

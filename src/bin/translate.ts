#!/usr/bin/env node
import { runTranslate } from "../cli/translate";
import { errorMessage } from "../services/errors";

runTranslate(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 1;
  }
);

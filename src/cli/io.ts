import { stat } from "node:fs/promises";
import type { LogSink } from "../services/logger";

export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export function processIO(): CliIO {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env
  };
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/** Node's parseArgs reports bad flags as a TypeError carrying an ERR_PARSE_ARGS_* code. */
export function isArgsError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS_")
  );
}

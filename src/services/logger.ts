export type LogLevel = "info" | "warn" | "error" | "dim";

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Write "dim" lines too. */
  verbose?: boolean;
  now?: () => Date;
}

export class Logger {
  private sink: LogSink;
  private verbose: boolean;
  private now: () => Date;

  constructor(sink: LogSink, options: LoggerOptions = {}) {
    this.sink = sink;
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? (() => new Date());
  }

  log(message: string, level: LogLevel = "info") {
    if (level === "dim" && !this.verbose) return;
    const t = this.now().toTimeString().slice(0, 8);
    const tag = level === "warn" || level === "error" ? `${level.toUpperCase()} ` : "";
    this.sink.write(`${t} — ${tag}${message}\n`);
  }
}

export class PptxFormatError extends Error {
  constructor(
    message: string,
    public partName?: string
  ) {
    super(message);
    this.name = "PptxFormatError";
  }
}

/** Raised when an optional slide element (title placeholder, notes page) is absent. */
export class FieldUnavailableError extends Error {
  constructor(
    public field: "title" | "notes",
    public slideNumber: number
  ) {
    super(`Slide ${slideNumber} has no ${field}`);
    this.name = "FieldUnavailableError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public detail?: unknown
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

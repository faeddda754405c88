export { ConfigError, FieldUnavailableError, PptxFormatError, errorMessage } from "./services/errors";
export { applyFont, applyParagraphFormat, rewriteTextFrame, snapshotTextFrame, translateOrKeep } from "./services/formatting";
export type { RewriteResult } from "./services/formatting";
export { Logger } from "./services/logger";
export type { LogLevel, LogSink, LoggerOptions } from "./services/logger";
export { MyMemoryBackend, MyMemoryError } from "./services/mymemory";
export { OpenAIBackend, OpenAIError } from "./services/openai";
export { analyzePresentation, extractPresentation, translatePresentation } from "./services/ppt";
export type { TranslationOutcome, WalkOptions } from "./services/ppt";
export { Presentation, Slide } from "./services/pptx/presentation";
export { Shape, Table, TableCell, TableRow } from "./services/pptx/shapes";
export type { ShapeKind } from "./services/pptx/shapes";
export { Font, Paragraph, Run, TextFrame } from "./services/pptx/text";
export type {
  Alignment,
  ColorModel,
  ColorTransform,
  FontColor,
  LineSpacing,
  UnderlineStyle
} from "./services/pptx/text";
export { DEFAULT_CONFIG_FILE, defaultSettings, loadSettings } from "./services/storage";
export type { LoadSettingsOptions, SettingsOverrides } from "./services/storage";
export { createBackend, createTranslateFn } from "./services/translator";
export type { TranslationBackend } from "./services/translator";
export { dedupeStrings, isCandidate } from "./utils/text";
export type * from "./utils/types";

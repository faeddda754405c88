import type {
  ExtractionRecord,
  SlideAnalysis,
  SlideRecord,
  TableCellRecord,
  TranslateFn,
  TranslationSummary
} from "../utils/types";
import { compileIgnoreRegex, dedupeStrings, isCandidate } from "../utils/text";
import { FieldUnavailableError, errorMessage } from "./errors";
import { rewriteTextFrame, translateOrKeep } from "./formatting";
import type { Logger } from "./logger";
import type { Presentation, Slide } from "./pptx/presentation";
import type { Shape } from "./pptx/shapes";
import { flattenShapes } from "./pptx/shapes";
import type { TextFrame } from "./pptx/text";

export interface WalkOptions {
  logger?: Logger;
  /** Regex on shape names; matching shapes are left alone. */
  ignoreShapes?: string;
}

export interface TranslationOutcome {
  presentation: Presentation;
  summary: TranslationSummary;
}

function shapeLabel(shape: Shape): string {
  return shape.name || `shape ${shape.key}`;
}

// Title and notes are optional: a read failure means "absent".
function readOptional<T>(read: () => T, logger?: Logger): T | null {
  try {
    return read();
  } catch (error) {
    if (!(error instanceof FieldUnavailableError)) {
      logger?.log(`Skipped unreadable field: ${errorMessage(error)}`, "warn");
    }
    return null;
  }
}

function findTitle(slide: Slide, logger?: Logger): Shape | null {
  return readOptional(() => slide.titleShape(), logger);
}

function findNotes(slide: Slide, logger?: Logger): TextFrame | null {
  return readOptional(() => slide.notesTextFrame(), logger);
}

/**
 * Every non-title shape in document order, members of group shapes
 * included. The title is matched by its position key, never by its text.
 */
function contentShapes(slide: Slide, title: Shape | null, ignore: RegExp | null, logger?: Logger): Shape[] {
  const out: Shape[] = [];
  for (const shape of flattenShapes(slide.shapes)) {
    if (title && shape.key === title.key) continue;
    if (ignore && ignore.test(shape.name)) {
      logger?.log(`Ignored: ${shapeLabel(shape)}`, "dim");
      continue;
    }
    out.push(shape);
  }
  return out;
}

function extractSlide(slide: Slide, strings: string[], logger?: Logger): SlideRecord {
  const collect = (text: string) => {
    if (isCandidate(text)) strings.push(text);
  };

  const titleShape = findTitle(slide, logger);
  const title = titleShape?.text.trim() ?? "";
  const entry: SlideRecord = title
    ? { slide_index: slide.number, title, items: [] }
    : { slide_index: slide.number, items: [] };
  if (title) collect(title);

  for (const shape of contentShapes(slide, titleShape, null)) {
    if (shape.hasTextFrame) {
      const text = shape.text.trim();
      if (text) {
        entry.items.push({ type: "text", text });
        collect(text);
      }
    }

    const table = shape.table;
    if (table) {
      const cells: TableCellRecord[] = [];
      table.rows.forEach((row, r) => {
        row.cells.forEach((cell, c) => {
          const text = cell.text.trim();
          if (!text) return;
          cells.push({ r, c, text });
          collect(text);
        });
      });
      if (cells.length) entry.items.push({ type: "table", cells });
    }
  }

  const notes = findNotes(slide, logger)?.text.trim() ?? "";
  if (notes) {
    entry.notes = notes;
    collect(notes);
  }

  return entry;
}

/** Per-slide text plus the deduplicated list of candidate strings. */
export function extractPresentation(presentation: Presentation, options: WalkOptions = {}): ExtractionRecord {
  const strings: string[] = [];
  const slides = presentation.slides.map((slide) => extractSlide(slide, strings, options.logger));
  return { slides, strings: dedupeStrings(strings) };
}

export function analyzePresentation(presentation: Presentation, logger?: Logger): SlideAnalysis[] {
  return presentation.slides.map((slide) => {
    let textBoxes = 0;
    let tables = 0;
    let paragraphs = 0;
    let characters = 0;

    for (const shape of flattenShapes(slide.shapes)) {
      if (shape.hasTable) {
        tables++;
        continue;
      }
      const tf = shape.textFrame;
      if (!tf) continue;
      const text = tf.text;
      if (!text.trim()) continue;
      textBoxes++;
      paragraphs += tf.paragraphs.length;
      characters += text.length;
    }

    const analysis: SlideAnalysis = { slideIndex: slide.number, textBoxes, tables, paragraphs, characters };
    logger?.log(
      `Slide ${slide.number} — ${textBoxes} text box(es), ${tables} table(s), ${paragraphs} paragraph(s)`,
      "dim"
    );
    return analysis;
  });
}

/**
 * Translates the deck in place: titles, text frames and table cells keep
 * their paragraph and run formatting, notes are replaced as plain text.
 * Translations run one at a time in document order.
 */
export async function translatePresentation(
  presentation: Presentation,
  translate: TranslateFn,
  options: WalkOptions = {}
): Promise<TranslationOutcome> {
  const { logger } = options;
  const ignore = compileIgnoreRegex(options.ignoreShapes ?? "");
  if (options.ignoreShapes?.trim() && !ignore) {
    logger?.log(`Invalid ignore pattern, no shapes skipped: ${options.ignoreShapes}`, "warn");
  }

  const summary: TranslationSummary = { frames: 0, runs: 0, failures: [] };
  const rewrite = async (frame: TextFrame | null) => {
    if (!frame) return;
    const res = await rewriteTextFrame(frame, translate, logger);
    if (!res.rewritten) return;
    summary.frames++;
    summary.runs += res.runs;
    summary.failures.push(...res.failures);
  };

  for (const slide of presentation.slides) {
    logger?.log(`Slide ${slide.number}/${presentation.slides.length} — translating…`);

    const title = findTitle(slide, logger);
    if (title) await rewrite(title.textFrame);

    for (const shape of contentShapes(slide, title, ignore, logger)) {
      await rewrite(shape.textFrame);

      const table = shape.table;
      if (!table) continue;
      for (const row of table.rows) {
        for (const cell of row.cells) {
          await rewrite(cell.textFrame);
        }
      }
    }

    const notes = findNotes(slide, logger);
    const notesText = notes?.text ?? "";
    if (notes && notesText.trim()) {
      notes.setText(await translateOrKeep(notesText, translate, summary.failures, logger));
      summary.frames++;
    }
  }

  logger?.log(
    `Translated ${summary.runs} run(s) in ${summary.frames} text frame(s), ${summary.failures.length} failure(s)`,
    "dim"
  );
  return { presentation, summary };
}

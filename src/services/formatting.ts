import type {
  ContentSnapshot,
  FontSnapshot,
  ParagraphFormatSnapshot,
  ParagraphSnapshot,
  TranslateFn,
  TranslationFailure
} from "../utils/types";
import { Run } from "./pptx/text";
import type { Font, Paragraph, TextFrame } from "./pptx/text";
import type { Logger } from "./logger";

export interface RewriteResult {
  rewritten: boolean;
  runs: number;
  failures: TranslationFailure[];
}

export function snapshotFont(font: Font): FontSnapshot {
  return {
    name: font.name,
    size: font.size,
    bold: font.bold,
    italic: font.italic,
    underline: font.underline,
    color: font.color
  };
}

export function snapshotParagraphFormat(paragraph: Paragraph): ParagraphFormatSnapshot {
  return {
    alignment: paragraph.alignment,
    indentLevel: paragraph.level,
    lineSpacing: paragraph.lineSpacing,
    spaceBefore: paragraph.spaceBefore,
    spaceAfter: paragraph.spaceAfter
  };
}

function snapshotContent(el: Element): ContentSnapshot {
  if (el.localName === "r") {
    const run = new Run(el);
    return { kind: "run", text: run.text, font: snapshotFont(run.font) };
  }
  const node = el.cloneNode(true);
  return el.localName === "br" ? { kind: "break", node } : { kind: "field", node };
}

export function snapshotTextFrame(frame: TextFrame): ParagraphSnapshot[] {
  return frame.paragraphs.map((p) => ({
    format: snapshotParagraphFormat(p),
    content: p.content.map(snapshotContent)
  }));
}

/**
 * Absent values leave the paragraph's current setting alone. A zero spacing
 * is a value and gets written.
 */
export function applyParagraphFormat(paragraph: Paragraph, format: ParagraphFormatSnapshot) {
  if (format.alignment !== null) paragraph.alignment = format.alignment;
  paragraph.level = format.indentLevel;
  if (format.lineSpacing !== null) paragraph.lineSpacing = format.lineSpacing;
  if (format.spaceBefore !== null) paragraph.spaceBefore = format.spaceBefore;
  if (format.spaceAfter !== null) paragraph.spaceAfter = format.spaceAfter;
}

export function applyFont(font: Font, snapshot: FontSnapshot) {
  if (snapshot.name !== null) font.name = snapshot.name;
  if (snapshot.size !== null) font.size = snapshot.size;
  if (snapshot.bold !== null) font.bold = snapshot.bold;
  if (snapshot.italic !== null) font.italic = snapshot.italic;
  if (snapshot.underline !== null) font.underline = snapshot.underline;
  if (snapshot.color !== null) font.color = snapshot.color;
}

export async function translateOrKeep(
  text: string,
  translate: TranslateFn,
  failures: TranslationFailure[],
  logger?: Logger
): Promise<string> {
  try {
    return await translate(text);
  } catch (caught) {
    const error = caught instanceof Error ? caught : new Error(String(caught));
    failures.push({ text, error });
    logger?.log(`Failed to translate text: ${JSON.stringify(text)} (${error.message})`, "warn");
    return text;
  }
}

/**
 * Rebuilds a text frame with every run translated. The paragraph and run
 * layout is captured before anything is touched and replayed afterwards, so
 * the frame ends with the same paragraph count, the same run count per
 * paragraph, and the same explicit formatting on each run. Line breaks and
 * fields (slide numbers, dates) go back where they were, untranslated.
 */
export async function rewriteTextFrame(
  frame: TextFrame,
  translate: TranslateFn,
  logger?: Logger
): Promise<RewriteResult> {
  if (!frame.text.trim()) return { rewritten: false, runs: 0, failures: [] };

  const snapshot = snapshotTextFrame(frame);
  const failures: TranslationFailure[] = [];
  let runs = 0;

  const first = frame.removeParagraphsAfterFirst();
  for (let i = 0; i < snapshot.length; i++) {
    const { format, content } = snapshot[i];
    const paragraph = i === 0 ? first : frame.addParagraph();
    applyParagraphFormat(paragraph, format);
    paragraph.clearRuns();

    for (const item of content) {
      if (item.kind !== "run") {
        paragraph.appendContent(item.node);
        continue;
      }
      const text = await translateOrKeep(item.text, translate, failures, logger);
      const run = paragraph.addRun(text);
      applyFont(run.font, item.font);
      runs++;
    }
  }

  return { rewritten: true, runs, failures };
}

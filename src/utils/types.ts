import type { Alignment, FontColor, LineSpacing, UnderlineStyle } from "../services/pptx/text";

export type Provider = "openai" | "mymemory";

export interface Settings {
  provider: Provider;
  apiKey: string;
  model: string;
  temperature: number;
  fromLang: string; // code
  toLang: string; // code, also the output file suffix
  ignoreShapes: string; // regex on shape names, "" = none
  myMemoryEmail: string;
}

export interface FontSnapshot {
  name: string | null;
  size: number | null;
  bold: boolean | null;
  italic: boolean | null;
  underline: UnderlineStyle | null;
  color: FontColor | null;
}

export interface RunSnapshot {
  text: string;
  font: FontSnapshot;
}

export interface ParagraphFormatSnapshot {
  alignment: Alignment | null;
  indentLevel: number;
  lineSpacing: LineSpacing | null;
  spaceBefore: number | null;
  spaceAfter: number | null;
}

/** Line breaks and fields are kept as detached copies and put back untranslated. */
export type ContentSnapshot =
  | ({ kind: "run" } & RunSnapshot)
  | { kind: "break"; node: Node }
  | { kind: "field"; node: Node };

export interface ParagraphSnapshot {
  format: ParagraphFormatSnapshot;
  content: ContentSnapshot[];
}

export type TranslateFn = (text: string) => Promise<string>;

export interface TranslationFailure {
  text: string;
  error: Error;
}

export interface TranslationSummary {
  frames: number;
  runs: number;
  failures: TranslationFailure[];
}

export interface TextItem {
  type: "text";
  text: string;
}

export interface TableCellRecord {
  r: number;
  c: number;
  text: string;
}

export interface TableItem {
  type: "table";
  cells: TableCellRecord[];
}

export type SlideItem = TextItem | TableItem;

export interface SlideRecord {
  slide_index: number;
  title?: string;
  items: SlideItem[];
  notes?: string;
}

export interface ExtractionRecord {
  slides: SlideRecord[];
  strings: string[];
}

export interface SlideAnalysis {
  slideIndex: number;
  textBoxes: number;
  tables: number;
  paragraphs: number;
  characters: number;
}

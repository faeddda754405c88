import {
  NS,
  boolAttr,
  childElements,
  createElement,
  ensureChild,
  firstChild,
  insertInOrder,
  intAttr,
  removeChild,
  replaceText,
  textOf
} from "./xml";

export type Alignment =
  | "left"
  | "center"
  | "right"
  | "justify"
  | "justifyLow"
  | "distribute"
  | "thaiDistribute";

export type LineSpacing = { kind: "lines"; value: number } | { kind: "points"; value: number };

export type ColorModel = "srgbClr" | "schemeClr" | "prstClr" | "sysClr" | "hslClr" | "scrgbClr";

/** A modifier under a color element, such as `lumMod`, `tint` or `alpha`. */
export interface ColorTransform {
  name: string;
  val: string | null;
}

/**
 * A DrawingML color as written: the color element's attributes (`val`,
 * `lastClr`, `hue`, `r`, ...) and its transforms in document order.
 */
export interface FontColor {
  model: ColorModel;
  attributes: Record<string, string>;
  transforms: ColorTransform[];
}

export type UnderlineStyle =
  | "none"
  | "words"
  | "sng"
  | "dbl"
  | "heavy"
  | "dotted"
  | "dottedHeavy"
  | "dash"
  | "dashHeavy"
  | "dashLong"
  | "dashLongHeavy"
  | "dotDash"
  | "dotDashHeavy"
  | "dotDotDash"
  | "dotDotDashHeavy"
  | "wavy"
  | "wavyHeavy"
  | "wavyDbl";

const ALIGNMENT_TOKENS: ReadonlyArray<[Alignment, string]> = [
  ["left", "l"],
  ["center", "ctr"],
  ["right", "r"],
  ["justify", "just"],
  ["justifyLow", "justLow"],
  ["distribute", "dist"],
  ["thaiDistribute", "thaiDist"]
];

const TOKEN_BY_ALIGNMENT = new Map<Alignment, string>(ALIGNMENT_TOKENS);
const ALIGNMENT_BY_TOKEN = new Map<string, Alignment>(ALIGNMENT_TOKENS.map(([name, token]) => [token, name]));

const UNDERLINE_STYLES: readonly UnderlineStyle[] = [
  "none",
  "words",
  "sng",
  "dbl",
  "heavy",
  "dotted",
  "dottedHeavy",
  "dash",
  "dashHeavy",
  "dashLong",
  "dashLongHeavy",
  "dotDash",
  "dotDashHeavy",
  "dotDotDash",
  "dotDotDashHeavy",
  "wavy",
  "wavyHeavy",
  "wavyDbl"
];

// Schema order of the children we touch.
const TX_BODY_ORDER = ["bodyPr", "lstStyle", "p"] as const;
const PARAGRAPH_ORDER = ["pPr", "endParaRPr"] as const;
const PPR_ORDER = ["lnSpc", "spcBef", "spcAft", "buClrTx", "buClr", "buSzTx", "buSzPct", "buSzPts", "buFontTx", "buFont", "buNone", "buAutoNum", "buChar", "buBlip", "tabLst", "defRPr", "extLst"] as const;
const RPR_ORDER = ["ln", "noFill", "solidFill", "gradFill", "blipFill", "pattFill", "grpFill", "effectLst", "effectDag", "highlight", "uLnTx", "uLn", "uFillTx", "uFill", "latin", "ea", "cs", "sym", "hlinkClick", "hlinkMouseOver", "rtl", "extLst"] as const;
const RUN_ORDER = ["rPr", "t"] as const;

const FILL_ELEMENTS = ["noFill", "solidFill", "gradFill", "blipFill", "pattFill", "grpFill"];
const COLOR_MODELS: readonly ColorModel[] = ["srgbClr", "schemeClr", "prstClr", "sysClr", "hslClr", "scrgbClr"];
const CONTENT_ELEMENTS = ["r", "br", "fld"];

function isColorModel(name: string): name is ColorModel {
  return COLOR_MODELS.some((m) => m === name);
}

function attributesOf(el: Element): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i);
    if (attr && !attr.name.startsWith("xmlns")) out[attr.name] = attr.value;
  }
  return out;
}

function readColor(fill: Element): FontColor | null {
  for (const el of childElements(fill, NS.a)) {
    if (!isColorModel(el.localName)) continue;
    return {
      model: el.localName,
      attributes: attributesOf(el),
      transforms: childElements(el, NS.a).map((t) => ({
        name: t.localName,
        val: t.hasAttribute("val") ? t.getAttribute("val") : null
      }))
    };
  }
  return null;
}

function isUnderlineStyle(value: string): value is UnderlineStyle {
  return UNDERLINE_STYLES.some((s) => s === value);
}

/** Reads `<a:spcPct>` / `<a:spcPts>` under a spacing element. */
function readSpacing(spacing: Element | null): LineSpacing | null {
  if (!spacing) return null;
  const pct = firstChild(spacing, NS.a, "spcPct");
  if (pct) {
    const val = intAttr(pct, "val");
    return val === null ? null : { kind: "lines", value: val / 100000 };
  }
  const pts = firstChild(spacing, NS.a, "spcPts");
  if (pts) {
    const val = intAttr(pts, "val");
    return val === null ? null : { kind: "points", value: val / 100 };
  }
  return null;
}

function writeSpacing(pPr: Element, localName: "lnSpc" | "spcBef" | "spcAft", value: LineSpacing | null): void {
  removeChild(pPr, NS.a, localName);
  if (value === null) return;
  const spacing = createElement(pPr, NS.a, localName);
  const inner = createElement(spacing, NS.a, value.kind === "lines" ? "spcPct" : "spcPts");
  const scaled = value.kind === "lines" ? value.value * 100000 : value.value * 100;
  inner.setAttribute("val", String(Math.round(scaled)));
  spacing.appendChild(inner);
  insertInOrder(pPr, spacing, PPR_ORDER);
}

function pointsOf(spacing: LineSpacing | null): number | null {
  return spacing && spacing.kind === "points" ? spacing.value : null;
}

export class Font {
  constructor(private readonly run: Element) {}

  private get rPr(): Element | null {
    return firstChild(this.run, NS.a, "rPr");
  }

  private ensureRPr(): Element {
    return ensureChild(this.run, NS.a, "rPr", RUN_ORDER);
  }

  private setFlag(attr: string, value: boolean | null): void {
    if (value === null) {
      this.rPr?.removeAttribute(attr);
      return;
    }
    this.ensureRPr().setAttribute(attr, value ? "1" : "0");
  }

  get name(): string | null {
    const latin = this.rPr ? firstChild(this.rPr, NS.a, "latin") : null;
    return latin?.getAttribute("typeface") || null;
  }

  set name(value: string | null) {
    if (value === null) {
      if (this.rPr) removeChild(this.rPr, NS.a, "latin");
      return;
    }
    ensureChild(this.ensureRPr(), NS.a, "latin", RPR_ORDER).setAttribute("typeface", value);
  }

  /** Size in points. */
  get size(): number | null {
    const sz = this.rPr ? intAttr(this.rPr, "sz") : null;
    return sz === null ? null : sz / 100;
  }

  set size(value: number | null) {
    if (value === null) {
      this.rPr?.removeAttribute("sz");
      return;
    }
    this.ensureRPr().setAttribute("sz", String(Math.round(value * 100)));
  }

  get bold(): boolean | null {
    return this.rPr ? boolAttr(this.rPr, "b") : null;
  }

  set bold(value: boolean | null) {
    this.setFlag("b", value);
  }

  get italic(): boolean | null {
    return this.rPr ? boolAttr(this.rPr, "i") : null;
  }

  set italic(value: boolean | null) {
    this.setFlag("i", value);
  }

  get underline(): UnderlineStyle | null {
    const u = this.rPr?.getAttribute("u") ?? null;
    return u !== null && isUnderlineStyle(u) ? u : null;
  }

  set underline(value: UnderlineStyle | null) {
    if (value === null) {
      this.rPr?.removeAttribute("u");
      return;
    }
    this.ensureRPr().setAttribute("u", value);
  }

  get color(): FontColor | null {
    const fill = this.rPr ? firstChild(this.rPr, NS.a, "solidFill") : null;
    return fill ? readColor(fill) : null;
  }

  set color(value: FontColor | null) {
    const existing = this.rPr;
    if (existing) {
      for (const name of FILL_ELEMENTS) removeChild(existing, NS.a, name);
    }
    if (value === null) return;
    const rPr = this.ensureRPr();
    const fill = createElement(rPr, NS.a, "solidFill");
    const clr = createElement(fill, NS.a, value.model);
    for (const [name, val] of Object.entries(value.attributes)) clr.setAttribute(name, val);
    for (const transform of value.transforms) {
      const el = createElement(clr, NS.a, transform.name);
      if (transform.val !== null) el.setAttribute("val", transform.val);
      clr.appendChild(el);
    }
    fill.appendChild(clr);
    insertInOrder(rPr, fill, RPR_ORDER);
  }
}

export class Run {
  readonly font: Font;

  constructor(readonly element: Element) {
    this.font = new Font(element);
  }

  get text(): string {
    const t = firstChild(this.element, NS.a, "t");
    return t ? textOf(t) : "";
  }

  set text(value: string) {
    replaceText(ensureChild(this.element, NS.a, "t", RUN_ORDER), value);
  }
}

export class Paragraph {
  constructor(readonly element: Element) {}

  private get pPr(): Element | null {
    return firstChild(this.element, NS.a, "pPr");
  }

  private ensurePPr(): Element {
    return ensureChild(this.element, NS.a, "pPr", PARAGRAPH_ORDER);
  }

  get alignment(): Alignment | null {
    const algn = this.pPr?.getAttribute("algn") ?? null;
    return algn === null ? null : ALIGNMENT_BY_TOKEN.get(algn) ?? null;
  }

  set alignment(value: Alignment | null) {
    if (value === null) {
      this.pPr?.removeAttribute("algn");
      return;
    }
    this.ensurePPr().setAttribute("algn", TOKEN_BY_ALIGNMENT.get(value) ?? "l");
  }

  /** Outline level, 0 to 8. */
  get level(): number {
    return (this.pPr ? intAttr(this.pPr, "lvl") : null) ?? 0;
  }

  set level(value: number) {
    if (value < 0 || value > 8 || !Number.isInteger(value)) {
      throw new RangeError(`Paragraph level must be an integer in 0..8, got ${value}`);
    }
    if (value === 0) {
      this.pPr?.removeAttribute("lvl");
      return;
    }
    this.ensurePPr().setAttribute("lvl", String(value));
  }

  get lineSpacing(): LineSpacing | null {
    return this.pPr ? readSpacing(firstChild(this.pPr, NS.a, "lnSpc")) : null;
  }

  set lineSpacing(value: LineSpacing | null) {
    if (value === null && !this.pPr) return;
    writeSpacing(this.ensurePPr(), "lnSpc", value);
  }

  /** Space before the paragraph, in points. */
  get spaceBefore(): number | null {
    return this.pPr ? pointsOf(readSpacing(firstChild(this.pPr, NS.a, "spcBef"))) : null;
  }

  set spaceBefore(value: number | null) {
    if (value === null && !this.pPr) return;
    writeSpacing(this.ensurePPr(), "spcBef", value === null ? null : { kind: "points", value });
  }

  /** Space after the paragraph, in points. */
  get spaceAfter(): number | null {
    return this.pPr ? pointsOf(readSpacing(firstChild(this.pPr, NS.a, "spcAft"))) : null;
  }

  set spaceAfter(value: number | null) {
    if (value === null && !this.pPr) return;
    writeSpacing(this.ensurePPr(), "spcAft", value === null ? null : { kind: "points", value });
  }

  get runs(): Run[] {
    return childElements(this.element, NS.a, "r").map((r) => new Run(r));
  }

  /** Run, field and line-break text; a soft break reads as "\v". */
  get text(): string {
    return childElements(this.element, NS.a)
      .map((el) => {
        if (el.localName === "br") return "\v";
        if (el.localName === "r" || el.localName === "fld") {
          const t = firstChild(el, NS.a, "t");
          return t ? textOf(t) : "";
        }
        return "";
      })
      .join("");
  }

  /** Runs, line breaks and fields in reading order. */
  get content(): Element[] {
    return childElements(this.element, NS.a).filter((el) => CONTENT_ELEMENTS.includes(el.localName));
  }

  /** Appends a run, break or field node; they share one slot, in reading order. */
  appendContent(el: Node): void {
    const end = firstChild(this.element, NS.a, "endParaRPr");
    if (end) {
      this.element.insertBefore(el, end);
    } else {
      this.element.appendChild(el);
    }
  }

  addRun(text = ""): Run {
    const r = createElement(this.element, NS.a, "r");
    this.appendContent(r);
    const run = new Run(r);
    run.text = text;
    return run;
  }

  addLineBreak(): void {
    this.appendContent(createElement(this.element, NS.a, "br"));
  }

  /** Removes runs, fields and line breaks; paragraph properties stay. */
  clearRuns(): void {
    for (const name of CONTENT_ELEMENTS) removeChild(this.element, NS.a, name);
  }
}

/** A `p:txBody` / `a:txBody`: the paragraphs of a shape or table cell. */
export class TextFrame {
  constructor(readonly element: Element) {}

  get paragraphs(): Paragraph[] {
    return childElements(this.element, NS.a, "p").map((p) => new Paragraph(p));
  }

  get text(): string {
    return this.paragraphs.map((p) => p.text).join("\n");
  }

  addParagraph(): Paragraph {
    const p = createElement(this.element, NS.a, "p");
    insertInOrder(this.element, p, TX_BODY_ORDER);
    return new Paragraph(p);
  }

  /** Drops every paragraph but the first; a frame always keeps one. */
  removeParagraphsAfterFirst(): Paragraph {
    const [first, ...rest] = childElements(this.element, NS.a, "p");
    for (const p of rest) this.element.removeChild(p);
    return first ? new Paragraph(first) : this.addParagraph();
  }

  /**
   * Replaces the whole text. Run formatting is dropped; the first
   * paragraph's properties are kept and "\n" / "\v" become new paragraphs
   * and line breaks.
   */
  setText(text: string): void {
    const first = this.removeParagraphsAfterFirst();
    first.clearRuns();
    text.split("\n").forEach((line, i) => {
      const p = i === 0 ? first : this.addParagraph();
      line.split("\v").forEach((piece, j) => {
        if (j > 0) p.addLineBreak();
        if (piece) p.addRun(piece);
      });
    });
  }
}

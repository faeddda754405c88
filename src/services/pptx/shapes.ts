import { TextFrame } from "./text";
import { NS, childElements, childPath, firstChild } from "./xml";

export type ShapeKind = "shape" | "group" | "graphicFrame" | "connector" | "picture";

const KIND_BY_ELEMENT: Record<string, ShapeKind> = {
  sp: "shape",
  grpSp: "group",
  graphicFrame: "graphicFrame",
  cxnSp: "connector",
  pic: "picture"
};

/** Shapes directly under a `p:spTree` or `p:grpSp`, keyed by position. */
export function shapesOf(container: Element, parentKey?: string): Shape[] {
  return childElements(container, NS.p)
    .filter((el) => el.localName in KIND_BY_ELEMENT)
    .map((el, i) => new Shape(el, parentKey === undefined ? String(i) : `${parentKey}/${i}`));
}

export class TableCell {
  constructor(readonly element: Element) {}

  get textFrame(): TextFrame | null {
    const txBody = firstChild(this.element, NS.a, "txBody");
    return txBody ? new TextFrame(txBody) : null;
  }

  get text(): string {
    return this.textFrame?.text ?? "";
  }
}

export class TableRow {
  constructor(readonly element: Element) {}

  get cells(): TableCell[] {
    return childElements(this.element, NS.a, "tc").map((tc) => new TableCell(tc));
  }
}

export class Table {
  constructor(readonly element: Element) {}

  get rows(): TableRow[] {
    return childElements(this.element, NS.a, "tr").map((tr) => new TableRow(tr));
  }
}

export class Shape {
  /**
   * `key` identifies the shape by position within its slide ("4", or "2/1"
   * for the second child of the third shape). Two shapes with the same text
   * never share a key.
   */
  constructor(
    readonly element: Element,
    readonly key: string
  ) {}

  get kind(): ShapeKind {
    return KIND_BY_ELEMENT[this.element.localName] ?? "shape";
  }

  private get nonVisual(): Element | null {
    return childElements(this.element, NS.p).find((el) => el.localName.startsWith("nv")) ?? null;
  }

  private get cNvPr(): Element | null {
    const nv = this.nonVisual;
    return nv ? firstChild(nv, NS.p, "cNvPr") : null;
  }

  get id(): string {
    return this.cNvPr?.getAttribute("id") ?? "";
  }

  get name(): string {
    return this.cNvPr?.getAttribute("name") ?? "";
  }

  /** Placeholder type, "obj" for a placeholder without one, null when not a placeholder. */
  get placeholderType(): string | null {
    const nv = this.nonVisual;
    const ph = nv ? childPath(nv, [NS.p, "nvPr"], [NS.p, "ph"]) : null;
    if (!ph) return null;
    return ph.getAttribute("type") || "obj";
  }

  get isTitle(): boolean {
    const type = this.placeholderType;
    return type === "title" || type === "ctrTitle";
  }

  get hasTextFrame(): boolean {
    return firstChild(this.element, NS.p, "txBody") !== null;
  }

  get textFrame(): TextFrame | null {
    const txBody = firstChild(this.element, NS.p, "txBody");
    return txBody ? new TextFrame(txBody) : null;
  }

  get hasTable(): boolean {
    return this.table !== null;
  }

  get table(): Table | null {
    if (this.kind !== "graphicFrame") return null;
    const tbl = childPath(this.element, [NS.a, "graphic"], [NS.a, "graphicData"], [NS.a, "tbl"]);
    return tbl ? new Table(tbl) : null;
  }

  get isGroup(): boolean {
    return this.kind === "group";
  }

  get children(): Shape[] {
    return this.isGroup ? shapesOf(this.element, this.key) : [];
  }

  get text(): string {
    return this.textFrame?.text ?? "";
  }
}

/** Depth-first over shapes and the members of group shapes. */
export function flattenShapes(shapes: Shape[]): Shape[] {
  return shapes.flatMap((shape) => (shape.isGroup ? flattenShapes(shape.children) : [shape]));
}

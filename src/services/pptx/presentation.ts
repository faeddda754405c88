import { readFile, writeFile } from "node:fs/promises";
import { FieldUnavailableError, PptxFormatError } from "../errors";
import { PptxPackage, REL_TYPE } from "./package";
import { Shape, shapesOf } from "./shapes";
import type { TextFrame } from "./text";
import { NS, childElements, childPath } from "./xml";

function spTreeOf(doc: Document): Element | null {
  return childPath(doc.documentElement, [NS.p, "cSld"], [NS.p, "spTree"]);
}

export class Slide {
  constructor(
    /** 1-based position in the deck. */
    readonly number: number,
    readonly partName: string,
    private readonly doc: Document,
    private readonly notesDoc: Document | null
  ) {}

  get shapes(): Shape[] {
    const tree = spTreeOf(this.doc);
    return tree ? shapesOf(tree) : [];
  }

  /** The title placeholder; throws FieldUnavailableError when the slide has none. */
  titleShape(): Shape {
    const title = this.shapes.find((s) => s.isTitle);
    if (!title) throw new FieldUnavailableError("title", this.number);
    return title;
  }

  get hasNotesSlide(): boolean {
    return this.notesDoc !== null;
  }

  /** Body placeholder of the notes page; throws FieldUnavailableError when absent. */
  notesTextFrame(): TextFrame {
    const tree = this.notesDoc ? spTreeOf(this.notesDoc) : null;
    const body = tree ? shapesOf(tree).find((s) => s.placeholderType === "body") : undefined;
    const frame = body?.textFrame;
    if (!frame) throw new FieldUnavailableError("notes", this.number);
    return frame;
  }
}

export class Presentation {
  private constructor(
    private readonly pkg: PptxPackage,
    readonly slides: Slide[]
  ) {}

  static async open(path: string): Promise<Presentation> {
    return Presentation.load(await readFile(path));
  }

  static async load(data: Buffer | Uint8Array): Promise<Presentation> {
    const pkg = await PptxPackage.load(data);
    const main = await pkg.mainPart();
    const doc = await pkg.getXml(main);
    const rels = await pkg.relationships(main);

    const sldIdLst = childPath(doc.documentElement, [NS.p, "sldIdLst"]);
    const slideIds = sldIdLst ? childElements(sldIdLst, NS.p, "sldId") : [];

    const slides: Slide[] = [];
    for (const sldId of slideIds) {
      const rId = sldId.getAttributeNS(NS.r, "id");
      const rel = rels.find((r) => r.id === rId && r.type.endsWith(REL_TYPE.slide));
      if (!rel) {
        throw new PptxFormatError(`Slide relationship ${rId ?? "(none)"} not found`, main);
      }
      const slideDoc = await pkg.getXml(rel.target);
      const notesPart = await pkg.relatedPart(rel.target, REL_TYPE.notesSlide);
      const notesDoc = notesPart && pkg.hasPart(notesPart) ? await pkg.getXml(notesPart) : null;
      slides.push(new Slide(slides.length + 1, rel.target, slideDoc, notesDoc));
    }

    return new Presentation(pkg, slides);
  }

  async toBuffer(): Promise<Buffer> {
    return this.pkg.toBuffer();
  }

  async save(path: string): Promise<void> {
    await writeFile(path, await this.toBuffer());
  }
}

import JSZip from "jszip";
import { posix } from "node:path";
import { PptxFormatError, errorMessage } from "../errors";
import { NS, childElements, parseXml, serializeXml } from "./xml";

export interface Relationship {
  id: string;
  type: string;
  /** Absolute part name inside the archive, without a leading slash. */
  target: string;
}

export const REL_TYPE = {
  officeDocument: "/officeDocument",
  slide: "/slide",
  notesSlide: "/notesSlide"
} as const;

function relsPartFor(partName: string): string {
  const dir = posix.dirname(partName);
  const base = posix.basename(partName);
  return dir === "." ? `_rels/${base}.rels` : `${dir}/_rels/${base}.rels`;
}

function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith("/")) return target.slice(1);
  const dir = posix.dirname(sourcePart);
  return posix.normalize(dir === "." ? target : `${dir}/${target}`);
}

/** The zip archive of a deck plus lazily parsed XML parts. */
export class PptxPackage {
  private readonly parts = new Map<string, Document>();
  private readonly rels = new Map<string, Relationship[]>();

  private constructor(private readonly zip: JSZip) {}

  static async load(data: Buffer | Uint8Array): Promise<PptxPackage> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      throw new PptxFormatError(`Not a PowerPoint package: ${errorMessage(error)}`);
    }
    return new PptxPackage(zip);
  }

  hasPart(partName: string): boolean {
    return this.zip.file(partName) !== null;
  }

  async getXml(partName: string): Promise<Document> {
    const cached = this.parts.get(partName);
    if (cached) return cached;

    const file = this.zip.file(partName);
    if (!file) throw new PptxFormatError(`Missing part: ${partName}`, partName);
    const doc = parseXml(await file.async("string"), partName);
    this.parts.set(partName, doc);
    return doc;
  }

  async relationships(partName: string): Promise<Relationship[]> {
    const cached = this.rels.get(partName);
    if (cached) return cached;

    const relsPart = relsPartFor(partName);
    const out: Relationship[] = [];
    if (this.hasPart(relsPart)) {
      const doc = await this.getXml(relsPart);
      for (const rel of childElements(doc.documentElement, NS.rels, "Relationship")) {
        if (rel.getAttribute("TargetMode") === "External") continue;
        out.push({
          id: rel.getAttribute("Id") ?? "",
          type: rel.getAttribute("Type") ?? "",
          target: resolveTarget(partName, rel.getAttribute("Target") ?? "")
        });
      }
    }
    this.rels.set(partName, out);
    return out;
  }

  async relatedPart(partName: string, typeSuffix: string): Promise<string | null> {
    const rels = await this.relationships(partName);
    return rels.find((r) => r.type.endsWith(typeSuffix))?.target ?? null;
  }

  async mainPart(): Promise<string> {
    const main = await this.relatedPart("", REL_TYPE.officeDocument);
    if (!main || !this.hasPart(main)) {
      throw new PptxFormatError("Package has no presentation part");
    }
    return main;
  }

  async toBuffer(): Promise<Buffer> {
    for (const [partName, doc] of this.parts) {
      this.zip.file(partName, serializeXml(doc));
    }
    return this.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }
}

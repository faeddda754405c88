import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { PptxFormatError } from "../errors";

export const NS = {
  a: "http://schemas.openxmlformats.org/drawingml/2006/main",
  p: "http://schemas.openxmlformats.org/presentationml/2006/main",
  r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  rels: "http://schemas.openxmlformats.org/package/2006/relationships"
} as const;

const DEFAULT_PREFIX: Record<string, string> = {
  [NS.a]: "a",
  [NS.p]: "p",
  [NS.r]: "r"
};

const ELEMENT_NODE = 1;

export function parseXml(xml: string, partName: string): Document {
  const parser = new DOMParser({
    // Unclosed and mismatched tags only rate a warning here.
    errorHandler: (_level: string, msg: unknown) => {
      throw new PptxFormatError(`Malformed XML in ${partName}: ${String(msg)}`, partName);
    }
  });
  const doc = parser.parseFromString(xml, "text/xml");
  if (!doc || !doc.documentElement) {
    throw new PptxFormatError(`Empty XML part: ${partName}`, partName);
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export function isNamed(el: Element, ns: string, localName: string): boolean {
  return el.namespaceURI === ns && el.localName === localName;
}

export function childElements(parent: Element, ns?: string, localName?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (!isElement(node)) continue;
    if (ns !== undefined && node.namespaceURI !== ns) continue;
    if (localName !== undefined && node.localName !== localName) continue;
    out.push(node);
  }
  return out;
}

export function firstChild(parent: Element, ns: string, localName: string): Element | null {
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (isElement(node) && isNamed(node, ns, localName)) return node;
  }
  return null;
}

/** Follows a chain of [ns, localName] steps through direct children. */
export function childPath(parent: Element, ...steps: Array<[string, string]>): Element | null {
  let cur: Element | null = parent;
  for (const [ns, localName] of steps) {
    if (!cur) return null;
    cur = firstChild(cur, ns, localName);
  }
  return cur;
}

export function createElement(owner: Element, ns: string, localName: string): Element {
  const prefix = owner.lookupPrefix(ns) ?? DEFAULT_PREFIX[ns];
  const qualified = prefix ? `${prefix}:${localName}` : localName;
  return owner.ownerDocument.createElementNS(ns, qualified);
}

/**
 * Returns the child named `localName`, creating it at the position `order`
 * dictates. Children missing from `order` are treated as sorting last.
 */
export function ensureChild(parent: Element, ns: string, localName: string, order: readonly string[]): Element {
  const existing = firstChild(parent, ns, localName);
  if (existing) return existing;
  const el = createElement(parent, ns, localName);
  insertInOrder(parent, el, order);
  return el;
}

export function insertInOrder(parent: Element, el: Element, order: readonly string[]): void {
  const rank = (name: string) => {
    const idx = order.indexOf(name);
    return idx === -1 ? order.length : idx;
  };
  const target = rank(el.localName);
  const before = childElements(parent).find((c) => rank(c.localName) > target);
  if (before) {
    parent.insertBefore(el, before);
  } else {
    parent.appendChild(el);
  }
}

export function removeChild(parent: Element, ns: string, localName: string): void {
  for (const el of childElements(parent, ns, localName)) {
    parent.removeChild(el);
  }
}

export function textOf(el: Element): string {
  return el.textContent ?? "";
}

export function replaceText(el: Element, text: string): void {
  while (el.firstChild) el.removeChild(el.firstChild);
  el.appendChild(el.ownerDocument.createTextNode(text));
}

export function intAttr(el: Element, name: string): number | null {
  if (!el.hasAttribute(name)) return null;
  const n = Number.parseInt(el.getAttribute(name) ?? "", 10);
  return Number.isFinite(n) ? n : null;
}

export function boolAttr(el: Element, name: string): boolean | null {
  if (!el.hasAttribute(name)) return null;
  const v = el.getAttribute(name);
  return v === "1" || v === "true";
}

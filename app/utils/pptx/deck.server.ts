import path from "node:path";

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import PizZip from "pizzip";

import type { Frame, Shape, TextRun, TextUnit } from "~/types/deck";
import { TemplateFormatError } from "../errors.server";

const NS = {
  p: "http://schemas.openxmlformats.org/presentationml/2006/main",
  a: "http://schemas.openxmlformats.org/drawingml/2006/main",
  r: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  rels: "http://schemas.openxmlformats.org/package/2006/relationships",
  types: "http://schemas.openxmlformats.org/package/2006/content-types"
} as const;

const IMAGE_REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image";
const PRESENTATION_PATH = "ppt/presentation.xml";
const CONTENT_TYPES_PATH = "[Content_Types].xml";
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
const ELEMENT_NODE = 1;
// 10in x 7.5in
const FALLBACK_SLIDE_SIZE = { cx: 9_144_000, cy: 6_858_000 };

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Node, ns?: string, localName?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i += 1) {
    const child = parent.childNodes.item(i);
    if (!child || !isElement(child)) continue;
    if (ns && child.namespaceURI !== ns) continue;
    if (localName && child.localName !== localName) continue;
    out.push(child);
  }
  return out;
}

function firstChild(parent: Node | null, ns: string, localName: string): Element | null {
  if (!parent) return null;
  return childElements(parent, ns, localName)[0] ?? null;
}

function descendants(root: Element, ns: string, localName: string, found: Element[] = []): Element[] {
  for (const child of childElements(root)) {
    if (child.namespaceURI === ns && child.localName === localName) {
      found.push(child);
    }
    descendants(child, ns, localName, found);
  }
  return found;
}

function readNumber(element: Element | null, attribute: string) {
  if (!element) return null;
  const value = Number(element.getAttribute(attribute));
  return element.hasAttribute(attribute) && Number.isFinite(value) ? value : null;
}

function readFrame(xfrm: Element | null): Frame | null {
  const off = firstChild(xfrm, NS.a, "off");
  const ext = firstChild(xfrm, NS.a, "ext");
  const x = readNumber(off, "x");
  const y = readNumber(off, "y");
  const cx = readNumber(ext, "cx");
  const cy = readNumber(ext, "cy");
  if (x === null || y === null || cx === null || cy === null) return null;
  return { x, y, cx, cy };
}

function readName(nvProps: Element | null) {
  return firstChild(nvProps, NS.p, "cNvPr")?.getAttribute("name") ?? "";
}

function escapeXml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

class XmlTextRun implements TextRun {
  constructor(private readonly node: Element) {}

  get text() {
    return this.node.textContent ?? "";
  }

  setText(value: string) {
    this.node.textContent = value;
  }
}

class XmlTextUnit implements TextUnit {
  readonly runs: readonly TextRun[];
  private readonly paragraphs: TextRun[][];

  constructor(body: Element) {
    // a:t under a:r only; fields (a:fld) are computed by PowerPoint.
    this.paragraphs = childElements(body, NS.a, "p").map((paragraph) =>
      childElements(paragraph, NS.a, "r")
        .map((run) => firstChild(run, NS.a, "t"))
        .filter((node): node is Element => node !== null)
        .map((node) => new XmlTextRun(node))
    );
    this.runs = this.paragraphs.flat();
  }

  get text() {
    return this.paragraphs.map((runs) => runs.map((run) => run.text).join("")).join("\n");
  }

  clear() {
    for (const run of this.runs) {
      run.setText("");
    }
  }
}

function parseShape(element: Element): Shape | null {
  if (element.namespaceURI !== NS.p) return null;

  switch (element.localName) {
    case "sp": {
      const name = readName(firstChild(element, NS.p, "nvSpPr"));
      const frame = readFrame(firstChild(firstChild(element, NS.p, "spPr"), NS.a, "xfrm"));
      const body = firstChild(element, NS.p, "txBody");
      return body ? { kind: "text", name, frame, body: new XmlTextUnit(body) } : { kind: "other", name, frame };
    }
    case "grpSp":
      return {
        kind: "group",
        name: readName(firstChild(element, NS.p, "nvGrpSpPr")),
        frame: readFrame(firstChild(firstChild(element, NS.p, "grpSpPr"), NS.a, "xfrm")),
        children: parseShapeList(element)
      };
    case "graphicFrame": {
      const name = readName(firstChild(element, NS.p, "nvGraphicFramePr"));
      const frame = readFrame(firstChild(element, NS.p, "xfrm"));
      const table = descendants(element, NS.a, "tbl")[0];
      if (!table) return { kind: "other", name, frame };
      const rows = childElements(table, NS.a, "tr").map((row) =>
        childElements(row, NS.a, "tc").map((cell) => {
          const body = firstChild(cell, NS.a, "txBody");
          return new XmlTextUnit(body ?? cell);
        })
      );
      return { kind: "table", name, frame, rows };
    }
    case "pic":
    case "cxnSp":
      return {
        kind: "other",
        name: readName(firstChild(element, NS.p, element.localName === "pic" ? "nvPicPr" : "nvCxnSpPr")),
        frame: readFrame(firstChild(firstChild(element, NS.p, "spPr"), NS.a, "xfrm"))
      };
    default:
      return null;
  }
}

function parseShapeList(container: Element): Shape[] {
  return childElements(container)
    .map(parseShape)
    .filter((shape): shape is Shape => shape !== null);
}

function relsPathFor(partPath: string) {
  return path.posix.join(path.posix.dirname(partPath), "_rels", `${path.posix.basename(partPath)}.rels`);
}

function nextRelationshipId(relationships: Element) {
  const used = childElements(relationships, NS.rels, "Relationship")
    .map((rel) => Number((rel.getAttribute("Id") ?? "").replace(/^rId/, "")))
    .filter((value) => Number.isFinite(value));
  return `rId${Math.max(0, ...used) + 1}`;
}

export class DeckSlide {
  readonly shapes: Shape[];
  private readonly shapeTree: Element;

  constructor(
    private readonly deck: PresentationDeck,
    readonly number: number,
    readonly partPath: string,
    private readonly document: Document
  ) {
    const tree = firstChild(firstChild(document.documentElement, NS.p, "cSld"), NS.p, "spTree");
    if (!tree) {
      throw new TemplateFormatError(`Slide ${partPath} has no shape tree`);
    }
    this.shapeTree = tree;
    this.shapes = parseShapeList(tree);
  }

  get title() {
    const titled = this.shapes.find((shape) => shape.kind === "text" && shape.body.text.trim());
    return titled?.kind === "text" ? titled.body.text.split("\n")[0] : "Untitled";
  }

  /** Adds a PNG picture on top of the slide at the given frame. */
  insertPicture(png: Buffer, frame: Frame, name: string) {
    const mediaPath = this.deck.addMedia(png, "png");
    const relId = this.deck.addRelationship(this.partPath, IMAGE_REL_TYPE, mediaPath);
    const shapeId = this.nextShapeId();

    const fragment = new DOMParser().parseFromString(
      `<p:pic xmlns:p="${NS.p}" xmlns:a="${NS.a}" xmlns:r="${NS.r}">` +
        `<p:nvPicPr><p:cNvPr id="${shapeId}" name="${escapeXml(name)}"/>` +
        `<p:cNvPicPr><a:picLocks noChangeAspect="1"/></p:cNvPicPr><p:nvPr/></p:nvPicPr>` +
        `<p:blipFill><a:blip r:embed="${relId}"/><a:stretch><a:fillRect/></a:stretch></p:blipFill>` +
        `<p:spPr><a:xfrm><a:off x="${frame.x}" y="${frame.y}"/><a:ext cx="${frame.cx}" cy="${frame.cy}"/></a:xfrm>` +
        `<a:prstGeom prst="rect"><a:avLst/></a:prstGeom></p:spPr>` +
        `</p:pic>`,
      "text/xml"
    );
    const picture = this.document.importNode(fragment.documentElement, true);
    this.shapeTree.appendChild(picture);
    this.shapes.push({ kind: "other", name, frame: { ...frame } });
    this.deck.markDirty(this.partPath, this.document);
  }

  private nextShapeId() {
    const ids = descendants(this.shapeTree, NS.p, "cNvPr")
      .map((element) => Number(element.getAttribute("id")))
      .filter((value) => Number.isFinite(value));
    return Math.max(1, ...ids) + 1;
  }
}

/**
 * An opened PowerPoint package. Slides are parsed once on load and mutated in
 * place; {@link PresentationDeck.toBuffer} writes every touched part back.
 */
export class PresentationDeck {
  readonly slides: DeckSlide[];
  readonly slideSize: { cx: number; cy: number };
  private readonly dirty = new Map<string, Document>();

  private constructor(private readonly zip: PizZip) {
    const presentation = this.readXml(PRESENTATION_PATH);
    if (!presentation) {
      throw new TemplateFormatError(`Template has no ${PRESENTATION_PATH}`);
    }

    const size = firstChild(presentation.documentElement, NS.p, "sldSz");
    this.slideSize = {
      cx: readNumber(size, "cx") ?? FALLBACK_SLIDE_SIZE.cx,
      cy: readNumber(size, "cy") ?? FALLBACK_SLIDE_SIZE.cy
    };
    this.slides = this.slidePaths(presentation).map((partPath, index) => {
      const document = this.readXml(partPath);
      if (!document) {
        throw new TemplateFormatError(`Template is missing slide part ${partPath}`);
      }
      // Text runs are edited in place, so every slide part is written back.
      this.markDirty(partPath, document);
      return new DeckSlide(this, index + 1, partPath, document);
    });
  }

  static load(bytes: Buffer | Uint8Array): PresentationDeck {
    let zip: PizZip;
    try {
      zip = new PizZip(bytes);
    } catch (error) {
      throw new TemplateFormatError("Template is not a valid .pptx package", { cause: error });
    }
    return new PresentationDeck(zip);
  }

  /** A frame centred on the slide, for chart slots that inherit their geometry. */
  centeredFrame(widthRatio = 0.6, heightRatio = 0.5): Frame {
    const cx = Math.round(this.slideSize.cx * widthRatio);
    const cy = Math.round(this.slideSize.cy * heightRatio);
    return {
      x: Math.round((this.slideSize.cx - cx) / 2),
      y: Math.round((this.slideSize.cy - cy) / 2),
      cx,
      cy
    };
  }

  markDirty(partPath: string, document: Document) {
    this.dirty.set(partPath, document);
  }

  addMedia(data: Buffer, extension: string) {
    let index = 1;
    while (this.zip.file(`ppt/media/image${index}.${extension}`)) {
      index += 1;
    }
    const mediaPath = `ppt/media/image${index}.${extension}`;
    this.zip.file(mediaPath, data);
    this.ensureDefaultContentType(extension, `image/${extension}`);
    return mediaPath;
  }

  addRelationship(sourcePath: string, type: string, targetPath: string) {
    const relsPath = relsPathFor(sourcePath);
    const document =
      this.dirty.get(relsPath) ??
      this.readXml(relsPath) ??
      new DOMParser().parseFromString(`<Relationships xmlns="${NS.rels}"/>`, "text/xml");
    const relationships = document.documentElement;
    const id = nextRelationshipId(relationships);

    const rel = document.createElementNS(NS.rels, "Relationship");
    rel.setAttribute("Id", id);
    rel.setAttribute("Type", type);
    rel.setAttribute("Target", path.posix.relative(path.posix.dirname(sourcePath), targetPath));
    relationships.appendChild(rel);

    this.markDirty(relsPath, document);
    return id;
  }

  toBuffer(): Buffer {
    const serializer = new XMLSerializer();
    for (const [partPath, document] of this.dirty) {
      this.zip.file(partPath, XML_DECLARATION + serializer.serializeToString(document.documentElement));
    }
    const output: unknown = this.zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
    if (!Buffer.isBuffer(output)) {
      throw new TemplateFormatError("Presentation could not be serialized");
    }
    return output;
  }

  /** Reads an XML part, preferring the in-memory copy when it has been modified. */
  readXml(partPath: string): Document | null {
    const pending = this.dirty.get(partPath);
    if (pending) return pending;
    const entry = this.zip.file(partPath);
    if (!entry) return null;
    return new DOMParser().parseFromString(entry.asText(), "text/xml");
  }

  private slidePaths(presentation: Document): string[] {
    const rels = this.readXml(relsPathFor(PRESENTATION_PATH));
    const targets = new Map<string, string>();
    if (rels) {
      for (const rel of childElements(rels.documentElement, NS.rels, "Relationship")) {
        const id = rel.getAttribute("Id");
        const target = rel.getAttribute("Target");
        if (id && target) {
          targets.set(id, path.posix.normalize(path.posix.join(path.posix.dirname(PRESENTATION_PATH), target)));
        }
      }
    }

    const list = firstChild(presentation.documentElement, NS.p, "sldIdLst");
    if (!list) return [];
    return childElements(list, NS.p, "sldId")
      .map((slideId) => targets.get(slideId.getAttributeNS(NS.r, "id") ?? ""))
      .filter((target): target is string => Boolean(target));
  }

  private ensureDefaultContentType(extension: string, contentType: string) {
    const document = this.readXml(CONTENT_TYPES_PATH);
    if (!document) return;
    const types = document.documentElement;
    const exists = childElements(types, NS.types, "Default").some(
      (entry) => entry.getAttribute("Extension")?.toLowerCase() === extension
    );
    if (exists) return;

    const entry = document.createElementNS(NS.types, "Default");
    entry.setAttribute("Extension", extension);
    entry.setAttribute("ContentType", contentType);
    types.insertBefore(entry, types.firstChild);
    this.markDirty(CONTENT_TYPES_PATH, document);
  }
}

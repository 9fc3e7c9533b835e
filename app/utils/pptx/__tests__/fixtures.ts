import PizZip from "pizzip";

import type { Frame } from "~/types/deck";

const P_NS = "http://schemas.openxmlformats.org/presentationml/2006/main";
const A_NS = "http://schemas.openxmlformats.org/drawingml/2006/main";
const R_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const SLIDE_REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide";

export const SLIDE_SIZE = { cx: 9_144_000, cy: 6_858_000 };

function escape(value: string) {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function xfrm(frame: Frame) {
  return `<a:xfrm><a:off x="${frame.x}" y="${frame.y}"/><a:ext cx="${frame.cx}" cy="${frame.cy}"/></a:xfrm>`;
}

function textBody(paragraphs: string[][], tag = "p:txBody") {
  const body = paragraphs
    .map((runs) => `<a:p>${runs.map((run) => `<a:r><a:rPr lang="en-US"/><a:t>${escape(run)}</a:t></a:r>`).join("")}</a:p>`)
    .join("");
  return `<${tag}><a:bodyPr/><a:lstStyle/>${body}</${tag}>`;
}

/** A text box; each inner array is one paragraph of runs. */
export function textShape(id: number, name: string, paragraphs: string[][], frame: Frame | null = null) {
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${name}"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr>` +
    `<p:spPr>${frame ? xfrm(frame) : ""}</p:spPr>${textBody(paragraphs)}</p:sp>`
  );
}

export function groupShape(id: number, name: string, children: string[]) {
  return (
    `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${id}" name="${name}"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr/>${children.join("")}</p:grpSp>`
  );
}

export function tableShape(id: number, name: string, rows: string[][]) {
  const body = rows
    .map((row) => `<a:tr h="370840">${row.map((cell) => `<a:tc>${textBody([[cell]], "a:txBody")}<a:tcPr/></a:tc>`).join("")}</a:tr>`)
    .join("");
  return (
    `<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="${id}" name="${name}"/><p:cNvGraphicFramePr/><p:nvPr/></p:nvGraphicFramePr>` +
    `<p:xfrm><a:off x="914400" y="914400"/><a:ext cx="6096000" cy="741680"/></p:xfrm>` +
    `<a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/table"><a:tbl><a:tblGrid/>${body}</a:tbl></a:graphicData></a:graphic>` +
    `</p:graphicFrame>`
  );
}

function slideXml(shapes: string[]) {
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
    `<p:sld xmlns:a="${A_NS}" xmlns:r="${R_NS}" xmlns:p="${P_NS}"><p:cSld><p:spTree>` +
    `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>` +
    `${shapes.join("")}</p:spTree></p:cSld></p:sld>`
  );
}

function toBuffer(zip: PizZip): Buffer {
  const output: unknown = zip.generate({ type: "nodebuffer" });
  if (!Buffer.isBuffer(output)) {
    throw new Error("PizZip did not produce a buffer");
  }
  return output;
}

/** Builds a minimal .pptx package, one slide per entry, listed in order. */
export function buildTestDeck(slides: string[][]): Buffer {
  const zip = new PizZip();
  zip.file(
    "[Content_Types].xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
      `<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">` +
      `<Default Extension="xml" ContentType="application/xml"/>` +
      `<Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/>` +
      `</Types>`
  );

  const ids = slides.map((_, index) => `<p:sldId id="${256 + index}" r:id="rId${index + 1}"/>`).join("");
  zip.file(
    "ppt/presentation.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
      `<p:presentation xmlns:a="${A_NS}" xmlns:r="${R_NS}" xmlns:p="${P_NS}">` +
      `<p:sldIdLst>${ids}</p:sldIdLst><p:sldSz cx="${SLIDE_SIZE.cx}" cy="${SLIDE_SIZE.cy}"/></p:presentation>`
  );

  const rels = slides
    .map((_, index) => `<Relationship Id="rId${index + 1}" Type="${SLIDE_REL_TYPE}" Target="slides/slide${index + 1}.xml"/>`)
    .join("");
  zip.file(
    "ppt/_rels/presentation.xml.rels",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
      `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${rels}</Relationships>`
  );

  slides.forEach((shapes, index) => {
    zip.file(`ppt/slides/slide${index + 1}.xml`, slideXml(shapes));
  });

  return toBuffer(zip);
}

/** Builds a package from raw parts, for malformed-template cases. */
export function buildRawPackage(parts: Record<string, string>): Buffer {
  const zip = new PizZip();
  for (const [partPath, content] of Object.entries(parts)) {
    zip.file(partPath, content);
  }
  return toBuffer(zip);
}

export function readPart(bytes: Buffer, partPath: string): string | null {
  return new PizZip(bytes).file(partPath)?.asText() ?? null;
}

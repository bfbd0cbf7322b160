/**
 * DOCX package reader.
 *
 * Opens the OOXML package with JSZip and walks `word/document.xml` in document
 * order, producing the paragraph, run and table objects the DOCX adapter
 * consumes. Style ids are resolved to display names through `word/styles.xml`
 * and list numbering kinds through `word/numbering.xml`.
 *
 * Uses fast-xml-parser with `preserveOrder: true` so interleaved paragraphs
 * and tables keep their order.
 */

import { XMLParser } from "fast-xml-parser";
import JSZip from "jszip";
import type {
  DocxElement,
  DocxNumbering,
  DocxParagraph,
  DocxRun,
  DocxTable,
  DocxTableCell,
} from "../adapters/types.js";
import { ExtractionError, errorMessage } from "../errors.js";

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
type OrderedNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  parseTagValue: false,
  preserveOrder: true,
  processEntities: true,
});

// ─── Navigation Helpers ──────────────────────────────────────────────

function isNodeArray(value: unknown): value is OrderedNode[] {
  return Array.isArray(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get the children array of an element node. */
function getChildren(node: OrderedNode | undefined): OrderedNode[] {
  if (!node) return [];
  const tag = getTagName(node);
  if (!tag) return [];
  const children = node[tag];
  return isNodeArray(children) ? children : [];
}

/** Get an attribute of an element node (e.g. `w:val`). */
function getAttr(node: OrderedNode | undefined, attrName: string): string | undefined {
  const attrs = node?.[":@"];
  if (!isRecord(attrs)) return undefined;
  const val = attrs[`@_${attrName}`];
  return val != null ? String(val) : undefined;
}

/** Find the first child element with the given tag name. */
function findChild(children: OrderedNode[], tagName: string): OrderedNode | undefined {
  return children.find((child) => tagName in child);
}

/** Find all child elements with the given tag name. */
function findChildren(children: OrderedNode[], tagName: string): OrderedNode[] {
  return children.filter((child) => tagName in child);
}

/** Concatenated text of every `w:t` below a node; tabs and breaks become whitespace. */
function extractText(node: OrderedNode): string {
  const tag = getTagName(node);
  if (tag === "w:t") {
    return getChildren(node)
      .map((child) => (child["#text"] != null ? String(child["#text"]) : ""))
      .join("");
  }
  if (tag === "w:tab") return "\t";
  if (tag === "w:br" || tag === "w:cr") return " ";
  if (tag === "w:noBreakHyphen") return "-";
  return getChildren(node).map(extractText).join("");
}

async function readZipXml(zip: JSZip, path: string): Promise<OrderedNode[] | null> {
  const file = zip.file(path);
  if (!file) return null;
  const xml = await file.async("string");
  const parsed: unknown = parser.parse(xml);
  return isNodeArray(parsed) ? parsed : null;
}

// ─── Styles and Numbering ────────────────────────────────────────────

/** Map style ids ("Heading1") to display names ("heading 1"). */
function parseStyleNames(parsed: OrderedNode[]): Map<string, string> {
  const names = new Map<string, string>();
  const styles = getChildren(findChild(parsed, "w:styles"));
  for (const style of findChildren(styles, "w:style")) {
    const id = getAttr(style, "w:styleId");
    const name = getAttr(findChild(getChildren(style), "w:name"), "w:val");
    if (id && name) names.set(id, name);
  }
  return names;
}

/** Map numId → (ilvl → ordered) from numbering definitions. */
function parseNumberingKinds(parsed: OrderedNode[]): Map<string, Map<string, boolean>> {
  const numbering = getChildren(findChild(parsed, "w:numbering"));

  const abstractKinds = new Map<string, Map<string, boolean>>();
  for (const abstractNum of findChildren(numbering, "w:abstractNum")) {
    const levels = new Map<string, boolean>();
    for (const lvl of findChildren(getChildren(abstractNum), "w:lvl")) {
      const ilvl = getAttr(lvl, "w:ilvl");
      const format = getAttr(findChild(getChildren(lvl), "w:numFmt"), "w:val");
      if (ilvl !== undefined && format !== undefined) {
        levels.set(ilvl, format !== "bullet" && format !== "none");
      }
    }
    const id = getAttr(abstractNum, "w:abstractNumId");
    if (id !== undefined) abstractKinds.set(id, levels);
  }

  const kinds = new Map<string, Map<string, boolean>>();
  for (const num of findChildren(numbering, "w:num")) {
    const numId = getAttr(num, "w:numId");
    const abstractId = getAttr(findChild(getChildren(num), "w:abstractNumId"), "w:val");
    const levels = abstractId !== undefined ? abstractKinds.get(abstractId) : undefined;
    if (numId !== undefined && levels) kinds.set(numId, levels);
  }
  return kinds;
}

// ─── Document Body ───────────────────────────────────────────────────

interface ReadContext {
  styles: Map<string, string>;
  numbering: Map<string, Map<string, boolean>>;
  warnings: string[];
}

/** Containers whose runs belong to the enclosing paragraph. */
const RUN_CONTAINERS = new Set(["w:hyperlink", "w:ins", "w:smartTag", "w:fldSimple", "w:customXml", "w:sdt", "w:sdtContent"]);

/** Body-level elements that carry no content. */
const IGNORED_BODY_TAGS = new Set(["w:sectPr", "w:bookmarkStart", "w:bookmarkEnd", "w:proofErr", "w:permStart", "w:permEnd"]);

const MONOSPACE_FONT = /courier|consolas|mono|menlo|monaco/i;

/** A toggle property is on unless its `w:val` says otherwise. */
function isOn(prop: OrderedNode | undefined): boolean {
  if (!prop) return false;
  const val = getAttr(prop, "w:val");
  return val === undefined || !["0", "false", "off", "none"].includes(val.toLowerCase());
}

function readRun(node: OrderedNode): DocxRun | undefined {
  const children = getChildren(node);
  const props = getChildren(findChild(children, "w:rPr"));
  const text = children
    .filter((child) => getTagName(child) !== "w:rPr")
    .map(extractText)
    .join("");
  if (!text) return undefined;

  const run: DocxRun = { text };
  if (isOn(findChild(props, "w:b"))) run.bold = true;
  if (isOn(findChild(props, "w:i"))) run.italic = true;
  const font = getAttr(findChild(props, "w:rFonts"), "w:ascii");
  if (font && MONOSPACE_FONT.test(font)) run.code = true;
  return run;
}

function readRuns(children: OrderedNode[]): DocxRun[] {
  const runs: DocxRun[] = [];
  for (const child of children) {
    const tag = getTagName(child);
    if (tag === "w:r") {
      const run = readRun(child);
      if (run) runs.push(run);
    } else if (tag && RUN_CONTAINERS.has(tag)) {
      runs.push(...readRuns(getChildren(child)));
    }
  }
  return runs;
}

function readNumbering(props: OrderedNode[], ctx: ReadContext): DocxNumbering | undefined {
  const numPr = getChildren(findChild(props, "w:numPr"));
  const numId = getAttr(findChild(numPr, "w:numId"), "w:val");
  if (!numId || numId === "0") return undefined;
  const ilvl = getAttr(findChild(numPr, "w:ilvl"), "w:val") ?? "0";
  const level = Number.parseInt(ilvl, 10);
  return {
    level: Number.isNaN(level) || level < 0 ? 0 : level,
    ordered: ctx.numbering.get(numId)?.get(ilvl) ?? false,
  };
}

function readParagraph(node: OrderedNode, ctx: ReadContext): DocxParagraph {
  const children = getChildren(node);
  const props = getChildren(findChild(children, "w:pPr"));
  const paragraph: DocxParagraph = { kind: "paragraph", runs: readRuns(children) };

  const styleId = getAttr(findChild(props, "w:pStyle"), "w:val");
  if (styleId) paragraph.style = ctx.styles.get(styleId) ?? styleId;

  const numbering = readNumbering(props, ctx);
  if (numbering) paragraph.numbering = numbering;
  return paragraph;
}

/** Plain text of a table nested inside a cell: cell texts joined by spaces. */
function flattenTableText(node: OrderedNode): string {
  return findChildren(getChildren(node), "w:tr")
    .flatMap((tr) => findChildren(getChildren(tr), "w:tc"))
    .map((tc) => extractText(tc).trim())
    .filter(Boolean)
    .join(" ");
}

function readCell(node: OrderedNode, ctx: ReadContext): DocxTableCell {
  const paragraphs: DocxParagraph[] = [];
  for (const child of getChildren(node)) {
    const tag = getTagName(child);
    if (tag === "w:p") {
      paragraphs.push(readParagraph(child, ctx));
    } else if (tag === "w:tbl") {
      ctx.warnings.push("Nested table flattened to plain text");
      paragraphs.push({ kind: "paragraph", runs: [{ text: flattenTableText(child) }] });
    }
  }
  return { paragraphs };
}

function readTable(node: OrderedNode, ctx: ReadContext): DocxTable {
  const rows = findChildren(getChildren(node), "w:tr").map((tr) =>
    findChildren(getChildren(tr), "w:tc").map((tc) => readCell(tc, ctx)),
  );
  return { kind: "table", rows };
}

function readBlockElements(children: OrderedNode[], ctx: ReadContext, out: DocxElement[]): void {
  for (const child of children) {
    const tag = getTagName(child);
    if (!tag || IGNORED_BODY_TAGS.has(tag)) continue;

    if (tag === "w:p") {
      out.push(readParagraph(child, ctx));
    } else if (tag === "w:tbl") {
      out.push(readTable(child, ctx));
    } else if (tag === "w:sdt") {
      readBlockElements(getChildren(findChild(getChildren(child), "w:sdtContent")), ctx, out);
    } else {
      ctx.warnings.push(`Unsupported element <${tag}> kept as plain text`);
      out.push({ kind: "unknown", name: tag, text: extractText(child) });
    }
  }
}

export interface DocxReadResult {
  elements: DocxElement[];
  warnings: string[];
}

/**
 * Read a DOCX package into paragraph, table and unknown-element objects.
 * Throws ExtractionError when the data is not a readable DOCX package.
 */
export async function readDocx(data: Uint8Array): Promise<DocxReadResult> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (err) {
    throw new ExtractionError(`Not a DOCX package: ${errorMessage(err)}`, { cause: err });
  }

  const document = await readZipXml(zip, "word/document.xml");
  if (!document) {
    throw new ExtractionError("DOCX package has no word/document.xml");
  }

  const ctx: ReadContext = {
    styles: parseStyleNames((await readZipXml(zip, "word/styles.xml")) ?? []),
    numbering: parseNumberingKinds((await readZipXml(zip, "word/numbering.xml")) ?? []),
    warnings: [],
  };

  const body = getChildren(findChild(getChildren(findChild(document, "w:document")), "w:body"));
  const elements: DocxElement[] = [];
  readBlockElements(body, ctx, elements);
  return { elements, warnings: ctx.warnings };
}

/**
 * DOCX adapter.
 *
 * Maps paragraphs and tables extracted from a Word document to Block Model
 * values. Heading styles become headings, list styles and numbered paragraphs
 * are grouped into (nested) lists, and everything unrecognized falls back to
 * a paragraph.
 */

import { buildLists, makeRun, mergeRuns, plainRuns, toHeadingLevel } from "../model/blocks.js";
import type { ListEntry } from "../model/blocks.js";
import type { Block, HeadingLevel, Row, RunSequence } from "../model/types.js";
import type {
  DocxElement,
  DocxNumbering,
  DocxParagraph,
  DocxTable,
  DocxTableCell,
} from "./types.js";

const HEADING_STYLE = /^heading\s*(\d+)$/;
const LIST_STYLE = /\blist\b|bullet/;

function normalizeStyle(style: string | undefined): string {
  return (style ?? "").trim().toLowerCase();
}

/** Heading level for a style name, or undefined when it is not a heading style. */
export function headingLevelForStyle(style: string | undefined): HeadingLevel | undefined {
  const name = normalizeStyle(style);
  if (name === "title") return 1;
  const match = HEADING_STYLE.exec(name);
  if (!match?.[1]) return undefined;
  return toHeadingLevel(Number.parseInt(match[1], 10));
}

/** List placement for a paragraph, from its numbering or its style name. */
function listPlacement(para: DocxParagraph): DocxNumbering | undefined {
  if (para.numbering) return para.numbering;
  const name = normalizeStyle(para.style);
  if (!LIST_STYLE.test(name)) return undefined;
  // "List Bullet 2", "List Number 3": the trailing digit is the 1-based level.
  const depth = /(\d+)$/.exec(name)?.[1];
  return {
    level: depth ? Math.max(0, Number.parseInt(depth, 10) - 1) : 0,
    ordered: name.includes("number"),
  };
}

function paragraphText(para: DocxParagraph): string {
  return para.runs.map((r) => r.text).join("");
}

function paragraphRuns(para: DocxParagraph): RunSequence {
  return mergeRuns(para.runs.map((r) => makeRun(r.text, r)));
}

function cellText(cell: DocxTableCell): string {
  return cell.paragraphs
    .map((p) => paragraphText(p).trim())
    .filter(Boolean)
    .join(" ");
}

function parseTable(table: DocxTable): Block | undefined {
  const rows: Row[] = table.rows.map((row) => row.map((cell) => plainRuns(cellText(cell))));
  const width = Math.max(0, ...rows.map((r) => r.length));
  if (rows.length === 0 || width === 0) return undefined;
  return { type: "table", rows };
}

/** Parse extracted DOCX elements into a Block sequence. */
export function parseDocx(elements: DocxElement[]): Block[] {
  const blocks: Block[] = [];
  let pendingList: ListEntry[] = [];

  const flushList = (): void => {
    if (pendingList.length > 0) blocks.push(...buildLists(pendingList));
    pendingList = [];
  };

  for (const element of elements) {
    switch (element.kind) {
      case "paragraph": {
        if (!paragraphText(element).trim()) continue;

        const level = headingLevelForStyle(element.style);
        if (level !== undefined) {
          flushList();
          blocks.push({ type: "heading", level, text: paragraphRuns(element) });
          continue;
        }

        const placement = listPlacement(element);
        if (placement) {
          pendingList.push({ ...placement, content: paragraphRuns(element) });
          continue;
        }

        flushList();
        blocks.push({ type: "paragraph", text: paragraphRuns(element) });
        break;
      }

      case "table": {
        flushList();
        const table = parseTable(element);
        if (table) blocks.push(table);
        break;
      }

      case "unknown": {
        flushList();
        const text = element.text.trim();
        if (text) blocks.push({ type: "paragraph", text: plainRuns(text) });
        break;
      }
    }
  }

  flushList();
  return blocks;
}

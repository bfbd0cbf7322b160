/**
 * Markdown adapter.
 *
 * A line-oriented state machine with two modes, `normal` and `in_code_block`.
 * In normal mode three accumulators collect multi-line constructs (the open
 * list, the open table and the open paragraph) until a line of another kind
 * or a blank line flushes them into blocks.
 */

import { buildLists, makeRun, mergeRuns, toHeadingLevel } from "../model/blocks.js";
import type { ListEntry } from "../model/blocks.js";
import type { Block, HeadingLevel, Row } from "../model/types.js";
import { resolveMarkdownInline } from "../latex/inline.js";
import { normalizeNewlines } from "./text.js";

// ---------------------------------------------------------------------------
// Line classification
// ---------------------------------------------------------------------------

export type MarkdownLine =
  | { kind: "blank" }
  | { kind: "rule" }
  | { kind: "fence"; marker: string; language?: string }
  | { kind: "heading"; level: HeadingLevel; text: string }
  | { kind: "list-item"; indent: number; ordered: boolean; text: string }
  | { kind: "table-row"; cells: string[]; separator: boolean }
  | { kind: "text"; indent: number; text: string };

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})[ \t]*([^\s`]*)[^`]*$/;
const HEADING_RE = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const RULE_RE = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM_RE = /^([ \t]*)([-*+]|\d{1,9}[.)])[ \t]+(.*)$/;
const TABLE_SEPARATOR_CELL_RE = /^:?-+:?$/;

/** Indentation width, counting a tab as four columns. */
function indentWidth(whitespace: string): number {
  let width = 0;
  for (const ch of whitespace) width += ch === "\t" ? 4 : 1;
  return width;
}

function splitTableRow(line: string): string[] {
  const inner = line.trim().replace(/^\|/, "").replace(/(?<!\\)\|$/, "");
  return inner.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

/** Classify one source line. Used by the state machine in normal mode. */
export function classifyLine(line: string): MarkdownLine {
  if (line.trim() === "") return { kind: "blank" };

  const fence = FENCE_RE.exec(line);
  if (fence?.[1]) {
    const language = fence[2];
    return language ? { kind: "fence", marker: fence[1], language } : { kind: "fence", marker: fence[1] };
  }

  const heading = HEADING_RE.exec(line);
  if (heading?.[1]) {
    const text = (heading[2] ?? "").replace(/(?:^|[ \t]+)#+$/, "");
    return { kind: "heading", level: toHeadingLevel(heading[1].length), text };
  }

  if (RULE_RE.test(line)) return { kind: "rule" };

  const item = LIST_ITEM_RE.exec(line);
  if (item?.[2] !== undefined) {
    return {
      kind: "list-item",
      indent: indentWidth(item[1] ?? ""),
      ordered: /\d/.test(item[2]),
      text: item[3] ?? "",
    };
  }

  if (line.trimStart().startsWith("|")) {
    const cells = splitTableRow(line);
    return {
      kind: "table-row",
      cells,
      separator: cells.every((c) => TABLE_SEPARATOR_CELL_RE.test(c)),
    };
  }

  const leading = /^[ \t]*/.exec(line)?.[0] ?? "";
  return { kind: "text", indent: indentWidth(leading), text: line.trim() };
}

/** Whether `line` closes a code block opened with `marker`. */
export function isClosingFence(line: string, marker: string): boolean {
  const ch = marker.charAt(0);
  const match = /^ {0,3}(`{3,}|~{3,})[ \t]*$/.exec(line);
  return !!match?.[1] && match[1].charAt(0) === ch && match[1].length >= marker.length;
}

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

type MarkdownState =
  | { mode: "normal" }
  | { mode: "in_code_block"; marker: string; language?: string; lines: string[] };

interface ListAccumulator {
  /** Indentation stack; its depth gives the nesting level of the next item. */
  indents: number[];
  entries: ListEntry[];
}

interface TableAccumulator {
  rows: Row[];
  lines: string[];
  hasSeparator: boolean;
}

class MarkdownParser {
  private state: MarkdownState = { mode: "normal" };
  private readonly blocks: Block[] = [];
  private list: ListAccumulator | undefined;
  private table: TableAccumulator | undefined;
  private paragraph: string[] = [];

  parse(source: string): Block[] {
    const lines = normalizeNewlines(source).split("\n");
    if (lines.at(-1) === "") lines.pop();
    for (const line of lines) {
      this.step(line);
    }
    if (this.state.mode === "in_code_block") {
      // Unterminated fence: close it at end of input.
      this.closeCodeBlock(this.state);
    }
    this.flushAll();
    return this.blocks;
  }

  private step(line: string): void {
    if (this.state.mode === "in_code_block") {
      if (isClosingFence(line, this.state.marker)) {
        this.closeCodeBlock(this.state);
      } else {
        this.state.lines.push(line);
      }
      return;
    }

    const parsed = classifyLine(line);
    switch (parsed.kind) {
      case "blank":
      case "rule":
        this.flushAll();
        break;

      case "fence":
        this.flushAll();
        this.state =
          parsed.language !== undefined
            ? { mode: "in_code_block", marker: parsed.marker, language: parsed.language, lines: [] }
            : { mode: "in_code_block", marker: parsed.marker, lines: [] };
        break;

      case "heading":
        this.flushAll();
        this.blocks.push({
          type: "heading",
          level: parsed.level,
          text: resolveMarkdownInline(parsed.text),
        });
        break;

      case "list-item":
        this.flushParagraph();
        this.flushTable();
        this.addListItem(parsed.indent, parsed.ordered, parsed.text);
        break;

      case "table-row":
        this.flushParagraph();
        this.flushList();
        this.addTableRow(line, parsed.cells, parsed.separator);
        break;

      case "text":
        if (this.list && parsed.indent > 0) {
          this.continueListItem(parsed.text);
          break;
        }
        this.flushList();
        this.flushTable();
        this.paragraph.push(parsed.text);
        break;
    }
  }

  private closeCodeBlock(state: Extract<MarkdownState, { mode: "in_code_block" }>): void {
    const rawText = state.lines.join("\n");
    this.blocks.push(
      state.language !== undefined
        ? { type: "code", language: state.language, rawText }
        : { type: "code", rawText },
    );
    this.state = { mode: "normal" };
  }

  private addListItem(indent: number, ordered: boolean, text: string): void {
    if (!this.list) {
      this.list = { indents: [indent], entries: [] };
    }
    const { indents } = this.list;
    while (indents.length > 1 && indent < (indents.at(-1) ?? 0)) indents.pop();
    if (indent > (indents.at(-1) ?? 0)) indents.push(indent);

    this.list.entries.push({
      level: indents.length - 1,
      ordered,
      content: resolveMarkdownInline(text),
    });
  }

  private continueListItem(text: string): void {
    const last = this.list?.entries.at(-1);
    if (!last) return;
    last.content = mergeRuns([...last.content, makeRun(" "), ...resolveMarkdownInline(text)]);
  }

  private addTableRow(line: string, cells: string[], separator: boolean): void {
    this.table ??= { rows: [], lines: [], hasSeparator: false };
    this.table.lines.push(line.trim());
    if (separator) {
      this.table.hasSeparator = true;
    } else {
      this.table.rows.push(cells.map(resolveMarkdownInline));
    }
  }

  private flushList(): void {
    if (this.list) this.blocks.push(...buildLists(this.list.entries));
    this.list = undefined;
  }

  private flushTable(): void {
    const table = this.table;
    this.table = undefined;
    if (!table) return;
    if (table.hasSeparator && table.rows.length > 0) {
      this.blocks.push({ type: "table", rows: table.rows });
    } else {
      // Pipes without a header separator are ordinary text.
      this.paragraph.push(...table.lines);
      this.flushParagraph();
    }
  }

  private flushParagraph(): void {
    if (this.paragraph.length > 0) {
      this.blocks.push({ type: "paragraph", text: resolveMarkdownInline(this.paragraph.join(" ")) });
    }
    this.paragraph = [];
  }

  private flushAll(): void {
    this.flushList();
    this.flushTable();
    this.flushParagraph();
  }
}

/** Parse Markdown source into a Block sequence. */
export function parseMarkdown(source: string): Block[] {
  return new MarkdownParser().parse(source);
}

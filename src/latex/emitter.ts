/**
 * LaTeX emitter.
 *
 * Serializes a Block sequence, behind a prebuilt preamble, into a complete
 * LaTeX document. Output depends only on the inputs.
 */

import type { Block, CodeBlock, HeadingLevel, ListBlock, Row, TableBlock } from "../model/types.js";
import { renderRuns } from "./inline.js";

export interface EmitOptions {
  /** Start the body with \maketitle (requires a title in the preamble) */
  maketitle?: boolean;
}

/** Sectioning commands from coarsest to finest; deeper levels reuse the last one. */
const SECTION_COMMANDS = ["section", "subsection", "subsubsection", "paragraph", "subparagraph"] as const;

export function sectionCommand(level: HeadingLevel): string {
  const index = Math.min(level, SECTION_COMMANDS.length) - 1;
  return SECTION_COMMANDS[index] ?? "subparagraph";
}

/**
 * `\item` and `\\` read a following `[` as an optional argument; an empty group
 * in front keeps the bracket literal.
 */
function guardBracket(text: string): string {
  return text.startsWith("[") ? `{}${text}` : text;
}

/** `\\` also takes a star form, so a row after it must not start with a literal `*`. */
function guardRowStart(text: string): string {
  return text.startsWith("*") ? `{}${text}` : guardBracket(text);
}

/** Join rendered cells with the column separator; empty cells leave a bare `&`. */
function joinCells(cells: string[]): string {
  return cells
    .map((cell, i) => (i === 0 ? guardRowStart(cell) : cell ? `& ${cell}` : "&"))
    .join(" ")
    .trim();
}

function emitTable(block: TableBlock): string {
  const width = Math.max(1, ...block.rows.map((row) => row.length));
  const pad = (row: Row): string[] => {
    const cells = row.map(renderRuns);
    while (cells.length < width) cells.push("");
    return cells;
  };

  const lines = ["\\begin{table}[H]", "\\centering", `\\begin{tabular}{${"l".repeat(width)}}`, "\\toprule"];
  block.rows.forEach((row, i) => {
    const joined = joinCells(pad(row));
    lines.push(joined ? `${joined} \\\\` : "\\\\");
    if (i === 0 && block.rows.length > 1) lines.push("\\midrule");
  });
  lines.push("\\bottomrule", "\\end{tabular}", "\\end{table}");
  return lines.join("\n");
}

function emitCode(block: CodeBlock): string {
  const language = (block.language ?? "").replace(/[^\w+#-]/g, "");
  const open = language ? `\\begin{lstlisting}[language=${language}]` : "\\begin{lstlisting}";
  return `${open}\n${block.rawText}\n\\end{lstlisting}`;
}

/** Emit a complete LaTeX document. */
export function emitLatex(blocks: readonly Block[], preamble: string, options: EmitOptions = {}): string {
  let depth = 0;

  const emitList = (list: ListBlock): string => {
    const env = list.ordered ? "enumerate" : "itemize";
    const indent = "  ".repeat(depth);
    const lines = [`${indent}\\begin{${env}}`];
    depth++;
    for (const item of list.items) {
      const content = renderRuns(item.content);
      lines.push(`${"  ".repeat(depth)}\\item${content ? ` ${guardBracket(content)}` : ""}`);
      if (item.children) lines.push(emitList(item.children));
    }
    depth--;
    lines.push(`${indent}\\end{${env}}`);
    return lines.join("\n");
  };

  const emitBlock = (block: Block): string => {
    switch (block.type) {
      case "heading":
        return `\\${sectionCommand(block.level)}{${renderRuns(block.text)}}`;
      case "paragraph":
        return renderRuns(block.text);
      case "list":
        return emitList(block);
      case "table":
        return emitTable(block);
      case "code":
        return emitCode(block);
    }
  };

  const head = preamble === "" || preamble.endsWith("\n") ? preamble : `${preamble}\n`;
  const body = blocks.map((block) => `${emitBlock(block)}\n\n`).join("");
  const title = options.maketitle ? "\\maketitle\n\n" : "";
  return `${head}\\begin{document}\n${title}${body}\\end{document}\n`;
}

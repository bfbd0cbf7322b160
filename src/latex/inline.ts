/**
 * Inline style resolution.
 *
 * Turns a line of Markdown inline syntax into a RunSequence of raw text, and
 * renders run sequences to LaTeX. Rendering always escapes a run's text before
 * wrapping it in style commands.
 */

import { makeRun, mergeRuns } from "../model/blocks.js";
import type { Run, RunSequence, RunStyle } from "../model/types.js";
import { escapeLatex } from "./escape.js";

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type EmphasisMarker = "*" | "**" | "***";

type InlineToken =
  | { kind: "text"; text: string }
  | { kind: "code"; text: string }
  | { kind: "delim"; marker: EmphasisMarker; canOpen: boolean; canClose: boolean };

/** Characters a backslash makes literal. */
const ESCAPABLE = new Set(["\\", "`", "*", "_", "#", "-", "+", ".", "!", "[", "]", "(", ")", "|"]);

function isWhitespace(ch: string | undefined): boolean {
  return ch === undefined || /\s/.test(ch);
}

function runLength(text: string, start: number, ch: string): number {
  let end = start;
  while (text[end] === ch) end++;
  return end - start;
}

/** Find a closing backtick run of exactly `length`, searching from `from`. */
function findClosingBackticks(text: string, from: number, length: number): number {
  let i = text.indexOf("`", from);
  while (i !== -1) {
    const n = runLength(text, i, "`");
    if (n === length) return i;
    i = text.indexOf("`", i + n);
  }
  return -1;
}

/** Split a run of `n` asterisks into emphasis markers. */
function splitStars(n: number): EmphasisMarker[] {
  const markers: EmphasisMarker[] = [];
  let rest = n;
  while (rest > 3) {
    markers.push("**");
    rest -= 2;
  }
  if (rest === 3) markers.push("***");
  else if (rest === 2) markers.push("**");
  else if (rest === 1) markers.push("*");
  return markers;
}

function tokenize(line: string): InlineToken[] {
  const tokens: InlineToken[] = [];
  let buffer = "";
  const flush = (): void => {
    if (buffer) tokens.push({ kind: "text", text: buffer });
    buffer = "";
  };

  let i = 0;
  while (i < line.length) {
    const ch = line.charAt(i);

    if (ch === "\\" && i + 1 < line.length && ESCAPABLE.has(line.charAt(i + 1))) {
      buffer += line.charAt(i + 1);
      i += 2;
      continue;
    }

    if (ch === "`") {
      const n = runLength(line, i, "`");
      const close = findClosingBackticks(line, i + n, n);
      if (close === -1) {
        buffer += line.slice(i, i + n);
      } else {
        flush();
        tokens.push({ kind: "code", text: line.slice(i + n, close) });
        i = close + n;
        continue;
      }
      i += n;
      continue;
    }

    if (ch === "*") {
      flush();
      const n = runLength(line, i, "*");
      let pos = i;
      for (const marker of splitStars(n)) {
        const before = line[pos - 1];
        const after = line[pos + marker.length];
        tokens.push({
          kind: "delim",
          marker,
          canOpen: !isWhitespace(after),
          canClose: !isWhitespace(before),
        });
        pos += marker.length;
      }
      i += n;
      continue;
    }

    buffer += ch;
    i++;
  }
  flush();
  return tokens;
}

// ---------------------------------------------------------------------------
// Delimiter matching
// ---------------------------------------------------------------------------

function applyMarker(style: RunStyle, marker: EmphasisMarker): RunStyle {
  return {
    ...style,
    bold: style.bold || marker !== "*",
    italic: style.italic || marker !== "**",
  };
}

function findCloser(tokens: InlineToken[], from: number, to: number, marker: EmphasisMarker): number {
  for (let j = from; j < to; j++) {
    const tok = tokens[j];
    if (tok?.kind === "delim" && tok.marker === marker && tok.canClose) return j;
  }
  return -1;
}

/** Resolve tokens[from, to) under an inherited style. Openers pair with the nearest closer. */
function resolveTokens(tokens: InlineToken[], from: number, to: number, style: RunStyle): Run[] {
  const runs: Run[] = [];
  let i = from;
  while (i < to) {
    const tok = tokens[i];
    if (!tok) break;
    switch (tok.kind) {
      case "text":
        runs.push(makeRun(tok.text, style));
        break;
      case "code":
        runs.push(makeRun(tok.text, { ...style, code: true }));
        break;
      case "delim": {
        const close = tok.canOpen ? findCloser(tokens, i + 1, to, tok.marker) : -1;
        if (close === -1) {
          runs.push(makeRun(tok.marker, style));
          break;
        }
        runs.push(...resolveTokens(tokens, i + 1, close, applyMarker(style, tok.marker)));
        i = close;
        break;
      }
    }
    i++;
  }
  return runs;
}

/**
 * Resolve Markdown inline syntax (`**bold**`, `*italic*`, `***both***`, `` `code` ``)
 * into a RunSequence of raw, unescaped text.
 *
 * Unmatched delimiters stay literal, and delimiters inside code spans are never
 * treated as style markers.
 */
export function resolveMarkdownInline(line: string): RunSequence {
  const tokens = tokenize(line);
  return mergeRuns(resolveTokens(tokens, 0, tokens.length, { bold: false, italic: false, code: false }));
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Escape a run's text, then wrap it: `\texttt` innermost, `\textbf` outermost. */
function renderRun(run: Run): string {
  if (run.text === "") return "";
  let out = escapeLatex(run.text);
  if (run.code) out = `\\texttt{${out}}`;
  if (run.italic) out = `\\textit{${out}}`;
  if (run.bold) out = `\\textbf{${out}}`;
  return out;
}

/** Render a run sequence to LaTeX inline markup. */
export function renderRuns(runs: RunSequence): string {
  return runs.map(renderRun).join("");
}

/**
 * End-to-end conversions from source text to complete LaTeX documents.
 */
import { describe, expect, it } from "vitest";
import { resolveConfig } from "../config.js";
import { buildPreamble } from "../latex/preamble.js";
import { convertDocument } from "./index.js";

const PREAMBLE = buildPreamble(resolveConfig());

/** Body text between the document markers. */
function bodyOf(tex: string): string {
  const begin = "\\begin{document}\n";
  const start = tex.indexOf(begin);
  expect(start).toBeGreaterThan(-1);
  expect(tex.endsWith("\\end{document}\n")).toBe(true);
  return tex.slice(start + begin.length, -"\\end{document}\n".length);
}

describe("Markdown to LaTeX", () => {
  it("converts headings and inline styles with escaping", () => {
    const tex = convertDocument({
      format: "md",
      text: "# Title\n\nSome **bold** and *italic* text with 100% & more.\n",
    });

    expect(tex).toBe(
      `${PREAMBLE}\\begin{document}\n\\section{Title}\n\nSome \\textbf{bold} and \\textit{italic} text with 100\\% \\& more.\n\n\\end{document}\n`,
    );
  });

  it("keeps fenced code unescaped in a listing", () => {
    const tex = convertDocument({ format: "md", text: "```python\nprint(1)\n```\n" });
    expect(bodyOf(tex)).toBe("\\begin{lstlisting}[language=python]\nprint(1)\n\\end{lstlisting}\n\n");
  });

  it("emits only the document frame for empty input", () => {
    expect(convertDocument({ format: "md", text: "" })).toBe(`${PREAMBLE}\\begin{document}\n\\end{document}\n`);
  });

  it("nests an ordered list inside an unordered item", () => {
    const tex = convertDocument({ format: "md", text: "- one\n- two\n  1. nested\n" });
    expect(bodyOf(tex)).toBe(
      [
        "\\begin{itemize}",
        "  \\item one",
        "  \\item two",
        "  \\begin{enumerate}",
        "    \\item nested",
        "  \\end{enumerate}",
        "\\end{itemize}",
        "",
        "",
      ].join("\n"),
    );
  });

  it("converts a mixed document", () => {
    const source = [
      "## Setup",
      "",
      "Install with `npm i` and set `$HOME`.",
      "",
      "| Key | Value |",
      "|-----|-------|",
      "| a_b | 10% |",
      "",
      "Unmatched *star stays literal.",
    ].join("\n");

    expect(bodyOf(convertDocument({ format: "md", text: source }))).toBe(
      [
        "\\subsection{Setup}",
        "",
        "Install with \\texttt{npm i} and set \\texttt{\\$HOME}.",
        "",
        "\\begin{table}[H]",
        "\\centering",
        "\\begin{tabular}{ll}",
        "\\toprule",
        "Key & Value \\\\",
        "\\midrule",
        "a\\_b & 10\\% \\\\",
        "\\bottomrule",
        "\\end{tabular}",
        "\\end{table}",
        "",
        "Unmatched *star stays literal.",
        "",
        "",
      ].join("\n"),
    );
  });
});

describe("Markdown tables", () => {
  it("keeps a literal asterisk at the start of a later row", () => {
    const tex = convertDocument({ format: "md", text: "| a | b |\n|---|---|\n| 1 | 2 |\n| *note | 3 |\n" });
    expect(bodyOf(tex)).toContain("1 & 2 \\\\\n{}*note & 3 \\\\\n");
  });
});

describe("DOCX to LaTeX", () => {
  it("maps styled paragraphs and lists", () => {
    const tex = convertDocument({
      format: "docx",
      elements: [
        { kind: "paragraph", style: "Heading 1", runs: [{ text: "Summary" }] },
        { kind: "paragraph", style: "List Bullet", runs: [{ text: "fast", bold: true }] },
        { kind: "paragraph", style: "List Bullet", runs: [{ text: "cheap & ", italic: true }, { text: "good" }] },
      ],
    });

    expect(bodyOf(tex)).toBe(
      [
        "\\section{Summary}",
        "",
        "\\begin{itemize}",
        "  \\item \\textbf{fast}",
        "  \\item \\textit{cheap \\& }good",
        "\\end{itemize}",
        "",
        "",
      ].join("\n"),
    );
  });
});

describe("Plain text and PDF to LaTeX", () => {
  it("escapes plain text without style detection", () => {
    const tex = convertDocument({ format: "txt", text: "Price: $5 for **two** #items" });
    expect(bodyOf(tex)).toBe("Price: \\$5 for **two** \\#items\n\n");
  });

  it("reflows PDF lines", () => {
    const tex = convertDocument({ format: "pdf", pages: ["A wrapped\nline_1\n\nNew para"] });
    expect(bodyOf(tex)).toBe("A wrapped line\\_1\n\nNew para\n\n");
  });
});

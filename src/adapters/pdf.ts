/**
 * PDF adapter.
 *
 * Extracted PDF text carries no structural markers, so the only structure
 * recovered is paragraph reflow: consecutive non-blank lines join into one
 * paragraph, and blank lines or page boundaries end it.
 */

import { plainRuns } from "../model/blocks.js";
import type { Block } from "../model/types.js";
import { normalizeNewlines } from "./text.js";

function reflowPage(pageText: string): string[] {
  const paragraphs: string[] = [];
  let current: string[] = [];

  for (const rawLine of normalizeNewlines(pageText).split("\n")) {
    const line = rawLine.trim();
    if (line === "") {
      if (current.length > 0) paragraphs.push(current.join(" "));
      current = [];
    } else {
      current.push(line);
    }
  }
  if (current.length > 0) paragraphs.push(current.join(" "));
  return paragraphs;
}

/**
 * Parse extracted PDF page texts into Paragraph blocks.
 * Pages without extractable text contribute nothing.
 */
export function parsePdf(pages: string[]): Block[] {
  return pages.flatMap(reflowPage).map((text): Block => ({ type: "paragraph", text: plainRuns(text) }));
}

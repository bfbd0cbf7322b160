/**
 * Plain text adapter: blank-line separated segments become unstyled paragraphs.
 */

import { plainRuns } from "../model/blocks.js";
import type { Block } from "../model/types.js";

/** Normalize line endings to `\n`. */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/** Parse plain text into Paragraph blocks. No inline style detection is done. */
export function parseText(text: string): Block[] {
  return normalizeNewlines(text)
    .split(/\n[ \t]*\n/)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "")
    .map((segment): Block => ({ type: "paragraph", text: plainRuns(segment) }));
}

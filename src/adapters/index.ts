/**
 * Format adapter dispatch.
 *
 * Each adapter turns one source format's raw data into a Block sequence; they
 * share no internal representation and are selected by the input's format tag.
 */

import { UnsupportedFormatError } from "../errors.js";
import type { Block } from "../model/types.js";
import { parseDocx } from "./docx.js";
import { parseMarkdown } from "./markdown.js";
import { parsePdf } from "./pdf.js";
import { parseText } from "./text.js";
import type { SourceFormat, SourceInput } from "./types.js";

export const SOURCE_FORMATS: readonly SourceFormat[] = ["docx", "pdf", "md", "txt"];

/** File extensions (lower case, with dot) recognized for each format. */
const EXTENSION_FORMATS: Readonly<Record<string, SourceFormat>> = {
  ".docx": "docx",
  ".pdf": "pdf",
  ".md": "md",
  ".markdown": "md",
  ".txt": "txt",
};

function isSourceFormat(tag: string): tag is SourceFormat {
  return SOURCE_FORMATS.some((f) => f === tag);
}

/** Validate an untyped format tag. Throws UnsupportedFormatError for unknown tags. */
export function toSourceFormat(tag: string): SourceFormat {
  const normalized = tag.trim().toLowerCase();
  if (!isSourceFormat(normalized)) throw new UnsupportedFormatError(tag);
  return normalized;
}

/** Map a file extension such as `.md` to its format. Throws UnsupportedFormatError. */
export function formatForExtension(ext: string): SourceFormat {
  const format = EXTENSION_FORMATS[ext.toLowerCase()];
  if (!format) throw new UnsupportedFormatError(ext || "(no extension)");
  return format;
}

/**
 * Run the adapter matching the input's format tag.
 * Throws UnsupportedFormatError for a tag no adapter handles.
 */
export function parseSource(input: SourceInput): Block[] {
  const tag = String(input.format);
  switch (input.format) {
    case "docx":
      return parseDocx(input.elements);
    case "pdf":
      return parsePdf(input.pages);
    case "md":
      return parseMarkdown(input.text);
    case "txt":
      return parseText(input.text);
    default:
      throw new UnsupportedFormatError(tag);
  }
}

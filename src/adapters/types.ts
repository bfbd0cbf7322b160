/**
 * Raw inputs accepted by the format adapters, as handed over by the extraction step.
 */

/** A text run of a DOCX paragraph with its character formatting. */
export interface DocxRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
  /** Set for runs in a monospace font */
  code?: boolean;
}

/** List numbering attached to a DOCX paragraph. */
export interface DocxNumbering {
  /** 0-based indentation level */
  level: number;
  ordered: boolean;
}

export interface DocxParagraph {
  kind: "paragraph";
  /** Style name as shown in Word (e.g. "Heading 1", "List Bullet") */
  style?: string;
  runs: DocxRun[];
  numbering?: DocxNumbering;
}

export interface DocxTableCell {
  paragraphs: DocxParagraph[];
}

export interface DocxTable {
  kind: "table";
  rows: DocxTableCell[][];
}

/** An embedded object the extractor does not understand, with whatever text it holds. */
export interface DocxUnknown {
  kind: "unknown";
  name: string;
  text: string;
}

export type DocxElement = DocxParagraph | DocxTable | DocxUnknown;

export type SourceFormat = "docx" | "pdf" | "md" | "txt";

/** Format-tagged raw input for one conversion. */
export type SourceInput =
  | { format: "docx"; elements: DocxElement[] }
  | { format: "pdf"; pages: string[] }
  | { format: "md"; text: string }
  | { format: "txt"; text: string };

/**
 * Intermediate representation shared by the format adapters and the LaTeX emitter.
 * A Block sequence is built fresh for each conversion and discarded afterwards.
 */

/** A span of inline text sharing one style combination. `text` is raw, never pre-escaped. */
export interface Run {
  text: string;
  bold: boolean;
  italic: boolean;
  code: boolean;
}

/** One logical line of inline content, in source reading order. */
export type RunSequence = Run[];

/** Style flags of a run, without its text. */
export type RunStyle = Omit<Run, "text">;

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingBlock {
  type: "heading";
  level: HeadingLevel;
  text: RunSequence;
}

export interface ParagraphBlock {
  type: "paragraph";
  text: RunSequence;
}

export interface ListItem {
  content: RunSequence;
  children?: ListBlock;
}

export interface ListBlock {
  type: "list";
  ordered: boolean;
  items: ListItem[];
}

/** A table cell is one run sequence; a row is an ordered list of cells. */
export type Cell = RunSequence;
export type Row = Cell[];

export interface TableBlock {
  type: "table";
  rows: Row[];
}

/** Literal code. `rawText` is emitted verbatim. */
export interface CodeBlock {
  type: "code";
  language?: string;
  rawText: string;
}

export type Block = HeadingBlock | ParagraphBlock | ListBlock | TableBlock | CodeBlock;

/**
 * Conversion configuration types.
 */

export const DOCUMENT_CLASSES = ["article", "report", "book"] as const;
export const FONT_SIZES = ["10pt", "11pt", "12pt"] as const;

export type DocumentClass = (typeof DOCUMENT_CLASSES)[number];
export type FontSize = (typeof FONT_SIZES)[number];

/**
 * Options controlling the generated preamble.
 * A resolved configuration is frozen and read-only for the whole conversion.
 */
export interface Configuration {
  docClass: DocumentClass;
  fontSize: FontSize;
  /** Options passed verbatim to the geometry package (e.g. "margin=1in") */
  margins: string;
  /** Packages loaded after the baseline set, in the order given */
  extraPackages: readonly string[];
  /** Trusted LaTeX appended verbatim at the end of the preamble */
  customPreamble: string;
  /** Document title; when set, the preamble declares it and the body starts with \maketitle */
  title?: string;
  /** Author shown by \maketitle (default: "Auto-Generated") */
  author?: string;
}

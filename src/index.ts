/**
 * # doc2tex
 *
 * Convert DOCX, PDF, Markdown and plain text documents into LaTeX source.
 *
 * ## Workflow
 *
 * 1. **Extract**: Read the raw structure of the source file (DOCX paragraphs, runs
 *    and tables; PDF page text; Markdown or text as a string).
 * 2. **Adapt**: Turn the extracted input into a Block sequence (headings, paragraphs,
 *    lists, tables, code blocks).
 * 3. **Emit**: Serialize the blocks behind a generated preamble. Run text is escaped
 *    first and wrapped in style commands second.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { convertDocument, convertFile, parsePackageList } from "doc2tex";
 *
 * // In memory
 * const tex = convertDocument(
 *   { format: "md", text: "# Title\n\nSome **bold** text with 100% & more.\n" },
 *   { fontSize: "11pt", extraPackages: parsePackageList("tikz, multirow") },
 * );
 *
 * // From a file; writes report.tex next to report.docx
 * const result = await convertFile("report.docx");
 * if (!result.success) console.error(result.error);
 * ```
 *
 * ## Configuration
 *
 * - **docClass**: `article` (default), `report` or `book`.
 * - **fontSize**: `10pt`, `11pt` or `12pt` (default).
 * - **margins**: geometry options, default `margin=1in`.
 * - **extraPackages**: packages loaded after the baseline set.
 * - **customPreamble**: trusted LaTeX appended verbatim to the preamble.
 * - **title** / **author**: optional title block and `\maketitle`.
 *
 * @module doc2tex
 */

// === Conversion ===
export { convertDocument, convertFile, defaultOutputPath } from "./convert/index.js";
export type { ConvertResult } from "./convert/index.js";

// === Adapters ===
export { formatForExtension, parseSource, toSourceFormat, SOURCE_FORMATS } from "./adapters/index.js";
export { parseDocx, headingLevelForStyle } from "./adapters/docx.js";
export { parseMarkdown, classifyLine } from "./adapters/markdown.js";
export type { MarkdownLine } from "./adapters/markdown.js";
export { parsePdf } from "./adapters/pdf.js";
export { parseText } from "./adapters/text.js";
export type {
  DocxElement,
  DocxNumbering,
  DocxParagraph,
  DocxRun,
  DocxTable,
  DocxTableCell,
  DocxUnknown,
  SourceFormat,
  SourceInput,
} from "./adapters/types.js";

// === Extraction ===
export { readDocx } from "./extract/docx-reader.js";
export type { DocxReadResult } from "./extract/docx-reader.js";
export { readPdfPages } from "./extract/pdf-reader.js";

// === LaTeX ===
export { escapeLatex } from "./latex/escape.js";
export { renderRuns, resolveMarkdownInline } from "./latex/inline.js";
export { buildPreamble, resolvePackages, BASELINE_PACKAGES } from "./latex/preamble.js";
export { emitLatex, sectionCommand } from "./latex/emitter.js";
export type { EmitOptions } from "./latex/emitter.js";

// === Block Model ===
export { buildLists, makeRun, mergeRuns, plainRuns } from "./model/blocks.js";
export type { ListEntry } from "./model/blocks.js";
export type {
  Block,
  Cell,
  CodeBlock,
  HeadingBlock,
  HeadingLevel,
  ListBlock,
  ListItem,
  ParagraphBlock,
  Row,
  Run,
  RunSequence,
  RunStyle,
  TableBlock,
} from "./model/types.js";

// === Configuration, Errors & Logging ===
export { DEFAULT_CONFIG, parsePackageList, resolveConfig } from "./config.js";
export { DOCUMENT_CLASSES, FONT_SIZES } from "./types.js";
export type { Configuration, DocumentClass, FontSize } from "./types.js";
export {
  ConversionError,
  ExtractionError,
  InvalidConfigurationError,
  UnsupportedFormatError,
} from "./errors.js";
export type { ConversionErrorCode } from "./errors.js";
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";

/**
 * Conversion entry points.
 *
 * `convertDocument` runs the synchronous core on already-extracted input.
 * `convertFile` adds the file handling around it: format detection from the
 * extension, extraction, and writing the `.tex` file.
 */

import { readFile, writeFile } from "node:fs/promises";
import { basename, extname, join, dirname } from "node:path";
import { formatForExtension, parseSource } from "../adapters/index.js";
import type { SourceFormat, SourceInput } from "../adapters/types.js";
import { resolveConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { readDocx } from "../extract/docx-reader.js";
import { readPdfPages } from "../extract/pdf-reader.js";
import { emitLatex } from "../latex/emitter.js";
import { buildPreamble } from "../latex/preamble.js";
import { createLogger } from "../logger.js";
import type { Block } from "../model/types.js";
import type { Configuration } from "../types.js";

const logger = createLogger("convert");

export interface ConvertResult {
  success: boolean;
  error?: string;
  format?: SourceFormat;
  outputPath?: string;
  /** Number of top-level blocks emitted */
  blocks?: number;
  /** Degradations that did not stop the conversion */
  warnings: string[];
}

function render(blocks: Block[], config: Readonly<Configuration>): string {
  return emitLatex(blocks, buildPreamble(config), { maketitle: config.title !== undefined });
}

/**
 * Convert extracted input to a LaTeX document.
 *
 * Throws InvalidConfigurationError for invalid options; never fails on the
 * content itself.
 */
export function convertDocument(input: SourceInput, config: Partial<Configuration> = {}): string {
  const resolved = resolveConfig(config);
  return render(parseSource(input), resolved);
}

/** Default output path: the input path with a `.tex` extension. */
export function defaultOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  return join(dirname(inputPath), `${basename(inputPath, ext)}.tex`);
}

function stripBom(text: string): string {
  return text.startsWith("\uFEFF") ? text.slice(1) : text;
}

async function readSource(
  inputPath: string,
  format: SourceFormat,
): Promise<{ input: SourceInput; warnings: string[] }> {
  switch (format) {
    case "docx": {
      const { elements, warnings } = await readDocx(await readFile(inputPath));
      return { input: { format, elements }, warnings };
    }
    case "pdf": {
      const pages = await readPdfPages(await readFile(inputPath));
      const warnings = pages.some((page) => page.trim() !== "")
        ? []
        : ["No text extracted from PDF; it may be scanned or image-only"];
      return { input: { format, pages }, warnings };
    }
    case "md":
    case "txt": {
      const text = stripBom(await readFile(inputPath, "utf-8"));
      return { input: { format, text }, warnings: [] };
    }
  }
}

/**
 * Convert a DOCX, PDF, Markdown or text file to a `.tex` file.
 *
 * Never throws: an unsupported extension, unreadable input or invalid options
 * yield `success: false` with an error message, and no file is written.
 */
export async function convertFile(
  inputPath: string,
  outputPath?: string,
  config: Partial<Configuration> = {},
): Promise<ConvertResult> {
  try {
    const format = formatForExtension(extname(inputPath));
    const resolved = resolveConfig(config);
    logger.debug(`Detected ${format} input: ${inputPath}`);

    const { input, warnings } = await readSource(inputPath, format);
    const blocks = parseSource(input);
    if (blocks.length === 0) warnings.push("Input produced no content");

    const target = outputPath ?? defaultOutputPath(inputPath);
    await writeFile(target, render(blocks, resolved), "utf-8");

    for (const warning of warnings) logger.warn(warning);
    logger.debug(`Wrote ${blocks.length} blocks to ${target}`);

    return { success: true, format, outputPath: target, blocks: blocks.length, warnings };
  } catch (err) {
    const error = errorMessage(err);
    logger.error(`Conversion of ${inputPath} failed: ${error}`);
    return { success: false, error, warnings: [] };
  }
}

/**
 * PDF text extraction with pdf-parse.
 *
 * Only the text layer is read; scanned or image-only pages yield empty text.
 * The library is imported on first use so that loading this package does not
 * pull in the PDF engine.
 */

import { ExtractionError, errorMessage } from "../errors.js";

/** Extract the text of each page, in page order. */
export async function readPdfPages(data: Uint8Array): Promise<string[]> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => page.text);
  } catch (err) {
    throw new ExtractionError(`Failed to extract PDF text: ${errorMessage(err)}`, { cause: err });
  } finally {
    await parser.destroy();
  }
}

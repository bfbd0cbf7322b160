/**
 * Error types raised by the conversion pipeline.
 *
 * Only an unsupported format and an invalid configuration stop a conversion;
 * structural problems in the source degrade to plain paragraphs instead.
 */

export type ConversionErrorCode = "UNSUPPORTED_FORMAT" | "INVALID_CONFIGURATION" | "EXTRACTION_FAILED";

/** Base class for errors surfaced to the caller of a conversion. */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionError";
    this.code = code;
  }
}

/** The format tag or file extension matches no adapter. */
export class UnsupportedFormatError extends ConversionError {
  readonly format: string;

  constructor(format: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file type: ${format}`);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

export class InvalidConfigurationError extends ConversionError {
  readonly field: string;

  constructor(field: string, value: unknown, allowed: readonly string[]) {
    super(
      "INVALID_CONFIGURATION",
      `Invalid ${field}: ${String(value)} (expected one of ${allowed.join(", ")})`,
    );
    this.name = "InvalidConfigurationError";
    this.field = field;
  }
}

/** The upstream extraction step could not read the input file. */
export class ExtractionError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super("EXTRACTION_FAILED", message, options);
    this.name = "ExtractionError";
  }
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { describe, it, expect } from "vitest";
import { UnsupportedFormatError } from "../errors.js";
import { makeRun, plainRuns } from "../model/blocks.js";
import { formatForExtension, parseSource, toSourceFormat } from "./index.js";
import type { SourceInput } from "./types.js";

describe("toSourceFormat", () => {
  it("accepts known tags case-insensitively", () => {
    expect(toSourceFormat("docx")).toBe("docx");
    expect(toSourceFormat(" MD ")).toBe("md");
  });

  it("rejects unknown tags", () => {
    expect(() => toSourceFormat("rtf")).toThrow(UnsupportedFormatError);
    expect(() => toSourceFormat("rtf")).toThrow("Unsupported file type: rtf");
  });
});

describe("formatForExtension", () => {
  it("maps extensions to formats", () => {
    expect(formatForExtension(".docx")).toBe("docx");
    expect(formatForExtension(".PDF")).toBe("pdf");
    expect(formatForExtension(".Markdown")).toBe("md");
    expect(formatForExtension(".txt")).toBe("txt");
  });

  it("rejects unknown or missing extensions", () => {
    expect(() => formatForExtension(".odt")).toThrow("Unsupported file type: .odt");
    expect(() => formatForExtension("")).toThrow("Unsupported file type: (no extension)");
  });

  it("sets the error code", () => {
    try {
      formatForExtension(".rtf");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedFormatError);
      expect(err).toHaveProperty("code", "UNSUPPORTED_FORMAT");
    }
  });
});

describe("parseSource", () => {
  it("dispatches on the format tag", () => {
    expect(parseSource({ format: "md", text: "**a**" })).toEqual([
      { type: "paragraph", text: [makeRun("a", { bold: true })] },
    ]);
    expect(parseSource({ format: "txt", text: "**a**" })).toEqual([
      { type: "paragraph", text: plainRuns("**a**") },
    ]);
    expect(parseSource({ format: "pdf", pages: ["p"] })).toEqual([{ type: "paragraph", text: plainRuns("p") }]);
    expect(parseSource({ format: "docx", elements: [] })).toEqual([]);
  });

  it("rejects an untyped input whose tag matches no adapter", () => {
    const input: SourceInput = JSON.parse('{"format":"rtf","text":"x"}');
    expect(() => parseSource(input)).toThrow(UnsupportedFormatError);
    expect(() => parseSource(input)).toThrow("Unsupported file type: rtf");
  });
});

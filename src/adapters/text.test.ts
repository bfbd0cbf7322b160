import { describe, it, expect } from "vitest";
import { plainRuns } from "../model/blocks.js";
import { normalizeNewlines, parseText } from "./text.js";

describe("normalizeNewlines", () => {
  it("converts CRLF and CR to LF", () => {
    expect(normalizeNewlines("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });
});

describe("parseText", () => {
  it("splits paragraphs on blank lines", () => {
    expect(parseText("First para\nstill first\n\n \n\nSecond\r\n\r\nThird\n")).toEqual([
      { type: "paragraph", text: plainRuns("First para\nstill first") },
      { type: "paragraph", text: plainRuns("Second") },
      { type: "paragraph", text: plainRuns("Third") },
    ]);
  });

  it("does not detect inline styles", () => {
    expect(parseText("**not bold** and `not code`")).toEqual([
      { type: "paragraph", text: plainRuns("**not bold** and `not code`") },
    ]);
  });

  it("returns no blocks for blank input", () => {
    expect(parseText("")).toEqual([]);
    expect(parseText("\n \n\t\n")).toEqual([]);
  });
});

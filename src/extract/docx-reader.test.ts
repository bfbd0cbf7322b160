import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { ExtractionError } from "../errors.js";
import { readDocx } from "./docx-reader.js";

const W_NS = 'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';

function documentXml(...body: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:document ${W_NS}><w:body>${body.join("")}<w:sectPr/></w:body></w:document>`;
}

const STYLES_XML = `<?xml version="1.0" encoding="UTF-8"?><w:styles ${W_NS}><w:style w:type="paragraph" w:styleId="Heading1"><w:name w:val="heading 1"/></w:style><w:style w:type="paragraph" w:styleId="ListBullet"><w:name w:val="List Bullet"/></w:style></w:styles>`;

const NUMBERING_XML = `<?xml version="1.0" encoding="UTF-8"?><w:numbering ${W_NS}><w:abstractNum w:abstractNumId="0"><w:lvl w:ilvl="0"><w:numFmt w:val="decimal"/></w:lvl><w:lvl w:ilvl="1"><w:numFmt w:val="bullet"/></w:lvl></w:abstractNum><w:num w:numId="1"><w:abstractNumId w:val="0"/></w:num></w:numbering>`;

async function buildDocx(files: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(files)) {
    zip.file(path, content);
  }
  return zip.generateAsync({ type: "uint8array" });
}

const p = (inner: string, props = ""): string => `<w:p>${props ? `<w:pPr>${props}</w:pPr>` : ""}${inner}</w:p>`;
const r = (text: string, props = ""): string =>
  `<w:r>${props ? `<w:rPr>${props}</w:rPr>` : ""}<w:t xml:space="preserve">${text}</w:t></w:r>`;

describe("readDocx", () => {
  it("reads paragraphs with resolved style names and run formatting", async () => {
    const data = await buildDocx({
      "word/document.xml": documentXml(
        p(r("Intro"), '<w:pStyle w:val="Heading1"/>'),
        p(r("Bold ", "<w:b/>") + r("plain", '<w:i w:val="0"/>') + r("R&amp;D", '<w:rFonts w:ascii="Courier New"/>')),
      ),
      "word/styles.xml": STYLES_XML,
    });

    const { elements, warnings } = await readDocx(data);

    expect(warnings).toEqual([]);
    expect(elements).toEqual([
      { kind: "paragraph", style: "heading 1", runs: [{ text: "Intro" }] },
      {
        kind: "paragraph",
        runs: [{ text: "Bold ", bold: true }, { text: "plain" }, { text: "R&D", code: true }],
      },
    ]);
  });

  it("keeps unknown style ids as they are", async () => {
    const data = await buildDocx({
      "word/document.xml": documentXml(p(r("x"), '<w:pStyle w:val="Quote"/>')),
    });
    const { elements } = await readDocx(data);
    expect(elements).toEqual([{ kind: "paragraph", style: "Quote", runs: [{ text: "x" }] }]);
  });

  it("reads list numbering kinds per level", async () => {
    const numPr = (ilvl: number, numId: number): string =>
      `<w:numPr><w:ilvl w:val="${ilvl}"/><w:numId w:val="${numId}"/></w:numPr>`;
    const data = await buildDocx({
      "word/document.xml": documentXml(
        p(r("first"), numPr(0, 1)),
        p(r("sub"), numPr(1, 1)),
        p(r("not a list"), numPr(0, 0)),
      ),
      "word/numbering.xml": NUMBERING_XML,
    });

    const { elements } = await readDocx(data);

    expect(elements).toEqual([
      { kind: "paragraph", runs: [{ text: "first" }], numbering: { level: 0, ordered: true } },
      { kind: "paragraph", runs: [{ text: "sub" }], numbering: { level: 1, ordered: false } },
      { kind: "paragraph", runs: [{ text: "not a list" }] },
    ]);
  });

  it("reads runs inside hyperlinks and converts tabs and breaks", async () => {
    const data = await buildDocx({
      "word/document.xml": documentXml(
        p(`<w:hyperlink><w:r><w:t>link</w:t></w:r></w:hyperlink><w:r><w:t>a</w:t><w:tab/><w:t>b</w:t><w:br/><w:t>c</w:t></w:r>`),
      ),
    });
    const { elements } = await readDocx(data);
    expect(elements).toEqual([{ kind: "paragraph", runs: [{ text: "link" }, { text: "a\tb c" }] }]);
  });

  it("reads tables in document order", async () => {
    const tc = (text: string): string => `<w:tc><w:tcPr/>${p(r(text))}</w:tc>`;
    const data = await buildDocx({
      "word/document.xml": documentXml(
        p(r("before")),
        `<w:tbl><w:tblPr/><w:tr>${tc("A")}${tc("B")}</w:tr><w:tr>${tc("1")}${tc("2")}</w:tr></w:tbl>`,
        p(r("after")),
      ),
    });

    const { elements } = await readDocx(data);

    const cell = (text: string) => ({ paragraphs: [{ kind: "paragraph", runs: [{ text }] }] });
    expect(elements).toEqual([
      { kind: "paragraph", runs: [{ text: "before" }] },
      { kind: "table", rows: [[cell("A"), cell("B")], [cell("1"), cell("2")]] },
      { kind: "paragraph", runs: [{ text: "after" }] },
    ]);
  });

  it("flattens nested tables and warns", async () => {
    const inner = `<w:tbl><w:tr><w:tc>${p(r("x"))}</w:tc><w:tc>${p(r("y"))}</w:tc></w:tr></w:tbl>`;
    const data = await buildDocx({
      "word/document.xml": documentXml(`<w:tbl><w:tr><w:tc>${inner}</w:tc></w:tr></w:tbl>`),
    });

    const { elements, warnings } = await readDocx(data);

    expect(warnings).toEqual(["Nested table flattened to plain text"]);
    expect(elements).toEqual([
      { kind: "table", rows: [[{ paragraphs: [{ kind: "paragraph", runs: [{ text: "x y" }] }] }]] },
    ]);
  });

  it("keeps unsupported body elements as unknown with their text", async () => {
    const data = await buildDocx({
      "word/document.xml": documentXml(`<w:customBlock><w:r><w:t>inside</w:t></w:r></w:customBlock>`),
    });

    const { elements, warnings } = await readDocx(data);

    expect(warnings).toEqual(["Unsupported element <w:customBlock> kept as plain text"]);
    expect(elements).toEqual([{ kind: "unknown", name: "w:customBlock", text: "inside" }]);
  });

  it("unwraps block-level content controls", async () => {
    const data = await buildDocx({
      "word/document.xml": documentXml(`<w:sdt><w:sdtPr/><w:sdtContent>${p(r("wrapped"))}</w:sdtContent></w:sdt>`),
    });
    const { elements } = await readDocx(data);
    expect(elements).toEqual([{ kind: "paragraph", runs: [{ text: "wrapped" }] }]);
  });

  it("rejects data that is not a zip package", async () => {
    await expect(readDocx(new Uint8Array([1, 2, 3]))).rejects.toThrow(ExtractionError);
    await expect(readDocx(new Uint8Array([1, 2, 3]))).rejects.toThrow(/^Not a DOCX package: /);
  });

  it("rejects a package without a main document", async () => {
    const data = await buildDocx({ "word/styles.xml": STYLES_XML });
    await expect(readDocx(data)).rejects.toThrow("DOCX package has no word/document.xml");
  });
});

import { describe, it, expect } from "vitest";
import { TextParser, stripHtml } from "./text-parser.js";
import { PdfTextParser } from "./pdf-parser.js";
import { createParserRegistry } from "./factory.js";

describe("TextParser", () => {
  const parser = new TextParser();

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.metadata).toEqual({ mimeType: "text/plain", charCount: 11, wordCount: 2 });
  });

  it("decodes Uint8Array input", async () => {
    const input = new TextEncoder().encode("  Encoded text \n");
    const result = await parser.parse(input, "text/markdown");

    expect(result.text).toBe("Encoded text");
  });

  it("strips HTML markup, scripts and styles", async () => {
    const html =
      '<script>alert("x")</script><style>p{color:red}</style><h1>Title</h1><p>Cache &amp; <b>store</b></p>';
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Title Cache & store");
  });

  it("estimates page count", async () => {
    const result = await parser.parse("x".repeat(9000), "text/plain");
    expect(result.pageCount).toBe(3);
  });

  it("returns empty text for whitespace-only input", async () => {
    const result = await parser.parse(" \n ", "text/plain");
    expect(result.text).toBe("");
  });
});

describe("stripHtml", () => {
  it("collapses whitespace left behind by tags", () => {
    expect(stripHtml("<ul>\n<li>one</li>\n<li>two</li></ul>")).toBe("one two");
  });

  it("decodes each entity once", () => {
    expect(stripHtml("<p>&amp;lt;b&amp;gt; is &lt;b&gt;</p>")).toBe("&lt;b&gt; is <b>");
  });
});

describe("PdfTextParser", () => {
  it("supports application/pdf", () => {
    expect(new PdfTextParser().supportedMimeTypes).toEqual(["application/pdf"]);
  });

  it("extracts text from each page", async () => {
    const pdf = buildPdf(["Grounded writing notes", "Second page text"]);
    const result = await new PdfTextParser().parse(pdf, "application/pdf");

    expect(result.pageCount).toBe(2);
    expect(result.text).toBe("Grounded writing notes\nSecond page text");
    expect(result.metadata).toEqual({ mimeType: "application/pdf", charCount: 39 });
  });

  it("rejects bytes that are not a PDF", async () => {
    await expect(
      new PdfTextParser().parse(new TextEncoder().encode("not a pdf"), "application/pdf"),
    ).rejects.toThrow();
  });
});

/** Minimal uncompressed PDF with one Helvetica text line per page. */
function buildPdf(pageTexts: string[]): Uint8Array {
  const pageIds = pageTexts.map((_, i) => 4 + i * 2);
  const objects: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageTexts.length} >>`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>",
  ];
  for (const [i, text] of pageTexts.entries()) {
    const contentsId = 4 + i * 2 + 1;
    const stream = `BT /F1 18 Tf 20 100 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 400 200] /Contents ${contentsId} 0 R /Resources << /Font << /F1 3 0 R >> >> >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    );
  }

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(body);
}

describe("createParserRegistry", () => {
  const registry = createParserRegistry();

  it("returns TextParser for text types", () => {
    expect(registry.getParser("text/plain")).toBeInstanceOf(TextParser);
    expect(registry.getParser("text/html")).toBeInstanceOf(TextParser);
  });

  it("returns PdfTextParser for application/pdf", () => {
    expect(registry.getParser("application/pdf")).toBeInstanceOf(PdfTextParser);
  });

  it("returns undefined for unsupported types", () => {
    expect(registry.getParser("image/png")).toBeUndefined();
  });

  it("lists every supported type", () => {
    expect(registry.supportedMimeTypes()).toEqual([
      "text/plain",
      "text/markdown",
      "text/html",
      "application/json",
      "application/pdf",
    ]);
  });
});

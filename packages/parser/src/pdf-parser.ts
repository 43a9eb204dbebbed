import { PDFParse } from "pdf-parse";
import type { ParseResult } from "@groundwrite/types";
import type { IParser } from "./parser.interface.js";

const PDF_MIME_TYPES = ["application/pdf"] as const;

/**
 * In-process PDF text extraction via pdf-parse. Pages are joined with
 * newlines; pages without text are skipped.
 */
export class PdfTextParser implements IParser {
  readonly supportedMimeTypes = PDF_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const data = typeof input === "string" ? new TextEncoder().encode(input) : input;
    const parser = new PDFParse({ data });

    try {
      const result = await parser.getText();
      const text = result.pages
        .map((page) => page.text.trim())
        .filter((page) => page.length > 0)
        .join("\n");

      return {
        text,
        pageCount: result.total,
        metadata: {
          mimeType,
          charCount: text.length,
        },
      };
    } finally {
      await parser.destroy();
    }
  }
}

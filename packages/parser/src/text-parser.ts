import type { ParseResult } from "@groundwrite/types";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/html",
  "application/json",
] as const;

const CHARS_PER_PAGE = 3000;

/**
 * Text-based formats, decoded as UTF-8. HTML loses its markup, scripts and styles.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);
    const cleanedText = (mimeType === "text/html" ? stripHtml(text) : text).trim();

    return {
      text: cleanedText,
      pageCount: Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE)),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }
}

export function stripHtml(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

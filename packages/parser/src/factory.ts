import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfTextParser } from "./pdf-parser.js";

/**
 * Parsers keyed by MIME type. Unknown types return undefined so the caller
 * can refuse the upload instead of indexing binary noise.
 */
export function createParserRegistry() {
  const parsers: IParser[] = [new TextParser(), new PdfTextParser()];

  return {
    getParser(mimeType: string): IParser | undefined {
      return parsers.find((p) => p.supportedMimeTypes.includes(mimeType));
    },
    supportedMimeTypes(): string[] {
      return parsers.flatMap((p) => [...p.supportedMimeTypes]);
    },
  };
}

export type ParserRegistry = ReturnType<typeof createParserRegistry>;

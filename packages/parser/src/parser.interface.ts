import type { ParseResult } from "@groundwrite/types";

export interface IParser {
  readonly supportedMimeTypes: readonly string[];
  parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult>;
}

export type { IParser } from "./parser.interface.js";
export { TextParser, stripHtml } from "./text-parser.js";
export { PdfTextParser } from "./pdf-parser.js";
export { createParserRegistry } from "./factory.js";
export type { ParserRegistry } from "./factory.js";

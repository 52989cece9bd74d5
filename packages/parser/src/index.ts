export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { DocxParser } from "./docx-parser.js";
export { getParser, baseMimeType } from "./factory.js";

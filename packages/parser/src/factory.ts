import type { IParser } from "./parser.interface.js";
import { DocxParser } from "./docx-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { TextParser } from "./text-parser.js";

const allParsers: IParser[] = [new TextParser(), new PdfParser(), new DocxParser()];

/** Media type without parameters, lowercased: `Text/HTML; charset=utf-8` → `text/html`. */
export function baseMimeType(mimeType: string): string {
  return mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
}

/**
 * Select the parser for a media type, ignoring parameters such as
 * `; charset=utf-8`. Returns null for formats nothing here can read
 * (images, legacy Office binaries).
 */
export function getParser(mimeType: string): IParser | null {
  const baseType = baseMimeType(mimeType);

  return allParsers.find((p) => p.supportedMimeTypes.includes(baseType)) ?? null;
}

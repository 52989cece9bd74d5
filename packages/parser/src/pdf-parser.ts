// The package root runs a self-test when loaded from an ES module; the library entry does not
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import type { ParseResult } from "@spacefeed/types";
import type { IParser } from "./parser.interface.js";
import { toBuffer } from "./binary-input.js";

/**
 * Text layer of a PDF attachment. Scanned PDFs without one yield empty text.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"] as const;

  async parse(input: Uint8Array | string, _mimeType: string): Promise<ParseResult> {
    const data = await pdfParse(toBuffer(input), { max: 0 });
    return { text: data.text.trim() };
  }
}

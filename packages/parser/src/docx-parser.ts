import mammoth from "mammoth";
import type { ParseResult } from "@spacefeed/types";
import type { IParser } from "./parser.interface.js";
import { toBuffer } from "./binary-input.js";

/** Raw text of a Word (.docx) attachment; headings and lists become plain paragraphs. */
export class DocxParser implements IParser {
  readonly supportedMimeTypes = [
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ] as const;

  async parse(input: Uint8Array | string, _mimeType: string): Promise<ParseResult> {
    const result = await mammoth.extractRawText({ buffer: toBuffer(input) });
    return { text: result.value.trim() };
  }
}

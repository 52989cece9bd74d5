import type { ParseResult } from "@spacefeed/types";

/**
 * Turns a page body or an attachment into plain text for ingestion.
 */
export interface IParser {
  readonly supportedMimeTypes: readonly string[];
  parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult>;
}

import type { ParseResult } from "@spacefeed/types";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
  "application/xhtml+xml",
] as const;

const MARKUP_MIME_TYPES: ReadonlySet<string> = new Set(["text/html", "application/xhtml+xml"]);

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  nbsp: " ",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  ndash: "-",
  mdash: "-",
  hellip: "...",
};

function escapeMarkup(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Plain text, markdown and HTML parser.
 * Confluence storage format is XHTML, so page bodies go through the markup path.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);

    return { text: MARKUP_MIME_TYPES.has(mimeType) ? this.stripHtml(text) : text };
  }

  private stripHtml(html: string): string {
    const withoutTags = html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      // Code macros keep their source in CDATA, which may itself contain '>'
      .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, (_match, body: string) => ` ${escapeMarkup(body)} `)
      .replace(/<[^>]+>/g, " ");

    return this.decodeEntities(withoutTags).replace(/\s+/g, " ").trim();
  }

  private decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith("#")) {
        const hex = entity[1] === "x" || entity[1] === "X";
        const codePoint = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
      }
      return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    });
  }
}

import type { IContentSource, LoadOptions, SourceDocument } from "@spacefeed/types";
import { NotFoundError } from "@spacefeed/errors";
import { TextParser, baseMimeType, getParser } from "@spacefeed/parser";
import { createLogger, type Logger } from "@spacefeed/logger";
import type { ConfluenceClient } from "./confluence-client.js";
import type { ConfluenceAttachment, ConfluencePage } from "./schemas.js";
import { paginate } from "./pagination.js";

const STORAGE_MIME_TYPE = "application/xhtml+xml";
const ATTACHMENT_SEPARATOR = "\n\n";

export interface ConfluenceLoaderOptions {
  logger?: Logger;
}

/**
 * Loads every current page of a space as a {@link SourceDocument}, optionally
 * with the text of its readable attachments appended.
 */
export class ConfluenceLoader implements IContentSource {
  private readonly logger: Logger;
  private readonly bodyParser = new TextParser();

  constructor(
    private readonly client: ConfluenceClient,
    options: ConfluenceLoaderOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ service: "confluence-loader" });
  }

  async load(options: LoadOptions): Promise<SourceDocument[]> {
    const { spaceKey, includeAttachments, limit, maxPages } = options;

    // Throws NotFoundError for an unknown key; an empty space is not an error
    const space = await this.client.getSpace(spaceKey);

    const pages = await paginate(
      (window) => this.client.listPages(spaceKey, window),
      limit,
      maxPages,
    );
    this.logger.info({ spaceKey, space: space.name, pageCount: pages.length }, "Listed space pages");

    const documents: SourceDocument[] = [];
    for (const page of pages) {
      documents.push(await this.toDocument(page, includeAttachments, limit));
    }
    return documents;
  }

  private async toDocument(
    page: ConfluencePage,
    includeAttachments: boolean,
    limit: number,
  ): Promise<SourceDocument> {
    const { text: body } = await this.bodyParser.parse(page.body?.storage?.value ?? "", STORAGE_MIME_TYPE);

    const attachmentTexts: string[] = [];
    if (includeAttachments) {
      const attachments = await paginate(
        (window) => this.client.listAttachments(page.id, window),
        limit,
      );
      for (const attachment of attachments) {
        const text = await this.attachmentText(page, attachment);
        if (text) attachmentTexts.push(text);
      }
    }

    return {
      content: [body, ...attachmentTexts].filter((part) => part.length > 0).join(ATTACHMENT_SEPARATOR),
      metadata: {
        id: page.id,
        title: page.title,
        source: this.client.resolveLink(page._links?.webui ?? `/pages/viewpage.action?pageId=${page.id}`),
        when: page.version?.when,
        attachmentCount: attachmentTexts.length,
      },
    };
  }

  private async attachmentText(
    page: ConfluencePage,
    attachment: ConfluenceAttachment,
  ): Promise<string | null> {
    const mediaType = baseMimeType(attachment.metadata?.mediaType ?? attachment.extensions?.mediaType ?? "");
    const parser = getParser(mediaType);

    if (!parser) {
      this.logger.debug(
        { pageId: page.id, attachment: attachment.title, mediaType },
        "Skipping attachment with unsupported media type",
      );
      return null;
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.client.downloadAttachment(attachment);
    } catch (error) {
      // Listed but deleted or moved since; the page is still ingested
      if (!(error instanceof NotFoundError)) throw error;
      this.logger.warn(
        { pageId: page.id, attachment: attachment.title, err: error.toLogObject() },
        "Attachment not found",
      );
      return null;
    }
    const result = await parser.parse(bytes, mediaType);
    return result.text.trim() || null;
  }
}

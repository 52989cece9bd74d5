import type {
  IContentSource,
  IIngestService,
  IngestionRequest,
  SourceDocument,
} from "@spacefeed/types";
import { computeDocumentId } from "@spacefeed/crypto";
import { ValidationError } from "@spacefeed/errors";
import { createChildLogger, createLogger, type Logger } from "@spacefeed/logger";

export const DEFAULT_PAGE_LIMIT = 1000;
export const DEFAULT_MAX_PAGES = 10_000_000;

export interface SpaceIngestorOptions {
  /** Results requested per content-source call. Default: 1000 */
  limit?: number;
  /** Ceiling on pages retrieved per space. Default: 10,000,000 */
  maxPages?: number;
  /** Append attachment text to page content. Default: true */
  includeAttachments?: boolean;
  logger?: Logger;
}

/**
 * Space ingestion: Load -> Identify -> Submit
 *
 * Loads every document of a space from an already authenticated content
 * source and submits each one, in order, under its content-derived
 * identifier. Deduplication is left to the ingestion service; a failure on
 * any document aborts the rest of the pass.
 */
export class SpaceIngestor {
  private readonly limit: number;
  private readonly maxPages: number;
  private readonly includeAttachments: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly ingestService: IIngestService,
    private readonly contentSource: IContentSource,
    options: SpaceIngestorOptions = {},
  ) {
    this.limit = options.limit ?? DEFAULT_PAGE_LIMIT;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.includeAttachments = options.includeAttachments ?? true;
    this.logger = options.logger ?? createLogger({ service: "space-ingestor" });
  }

  async ingestSpace(spaceKey: string): Promise<void> {
    if (spaceKey.trim().length === 0) {
      throw new ValidationError("Space key must not be empty", { spaceKey: "Required" });
    }

    const log = createChildLogger(this.logger, { spaceKey });
    log.info("Loading space");

    const documents = await this.contentSource.load({
      spaceKey,
      includeAttachments: this.includeAttachments,
      limit: this.limit,
      maxPages: this.maxPages,
    });
    log.info({ total: documents.length }, "Loaded documents");

    let current = 0;
    for (const document of documents) {
      const request = toIngestionRequest(document);
      current += 1;
      log.debug(
        { current, total: documents.length, documentId: request.documentId, title: document.metadata.title },
        "Submitting document",
      );
      await this.ingestService.ingestText(request.documentId, request.text);
    }

    log.info({ total: documents.length }, "Space ingested");
  }
}

export function toIngestionRequest(document: SourceDocument): IngestionRequest {
  return {
    documentId: computeDocumentId(document.content),
    text: document.content,
  };
}

import type { SourceDocument } from "./document.js";

export interface LoadOptions {
  spaceKey: string;
  includeAttachments: boolean;
  /** Number of results requested per API call. */
  limit: number;
  /** Ceiling on the number of pages retrieved from the space. */
  maxPages: number;
}

export interface IContentSource {
  load(options: LoadOptions): Promise<SourceDocument[]>;
}

export interface IIngestService {
  ingestText(documentId: string, text: string): Promise<void>;
}

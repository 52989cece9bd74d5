export interface DocumentMetadata {
  /** Confluence content id of the page. */
  id: string;
  title: string;
  /** Absolute web URL of the page. */
  source: string;
  /** ISO8601 timestamp of the page version that was loaded. */
  when?: string;
  attachmentCount: number;
}

/**
 * A page loaded from a content source, with the text of its attachments
 * appended. Lives only for the duration of one ingestion pass.
 */
export interface SourceDocument {
  content: string;
  metadata: DocumentMetadata;
}

export interface IngestionRequest {
  documentId: string;
  text: string;
}

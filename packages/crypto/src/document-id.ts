import crypto from "node:crypto";

const DOCUMENT_ID_ALGORITHM = "sha1";

/**
 * Content-addressed identifier for a document: hex SHA-1 of the UTF-8 bytes
 * of its text. The ingestion service uses it as the deduplication key, so it
 * must depend on the content and nothing else.
 */
export function computeDocumentId(content: string): string {
  return crypto.createHash(DOCUMENT_ID_ALGORITHM).update(content, "utf8").digest("hex");
}

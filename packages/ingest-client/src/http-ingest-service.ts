import type { IIngestService } from "@spacefeed/types";
import { ExternalServiceError, errorForStatus } from "@spacefeed/errors";

const SERVICE = "ingest";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpIngestServiceConfig {
  baseUrl: string;
  fetch?: FetchFn;
}

interface IngestTextBody {
  file_name: string;
  text: string;
}

/**
 * Ingestion service reached over HTTP. Text is posted to `/v1/ingest/text`
 * with the document identifier as its file name; storage, chunking and
 * embedding all happen on the other side.
 */
export class HttpIngestService implements IIngestService {
  private baseUrl: string;
  private fetchFn: FetchFn;

  constructor(config: HttpIngestServiceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  async ingestText(documentId: string, text: string): Promise<void> {
    const body: IngestTextBody = { file_name: documentId, text };
    const response = await this.fetchFn(`${this.baseUrl}/v1/ingest/text`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const detail = await response.text();
      throw errorForStatus(
        SERVICE,
        response.status,
        `Ingestion of ${documentId} failed: ${String(response.status)} ${response.statusText}`.trim(),
        { details: { documentId, ...(detail ? { response: detail } : {}) } },
      );
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }

  /** Throws unless {@link healthCheck} passes. */
  async assertHealthy(): Promise<void> {
    if (!(await this.healthCheck())) {
      throw new ExternalServiceError(`Ingestion service at ${this.baseUrl} is not healthy`, SERVICE);
    }
  }
}

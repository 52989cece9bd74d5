import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError, NotFoundError } from "@spacefeed/errors";
import { HttpIngestService } from "./http-ingest-service.js";

function fetchReturning(response: () => Response) {
  return vi.fn(async (_url: string, _init?: RequestInit) => response());
}

describe("HttpIngestService", () => {
  describe("ingestText", () => {
    it("posts the identifier and text as JSON", async () => {
      const fetch = fetchReturning(() => new Response(JSON.stringify({ data: [] }), { status: 200 }));
      const service = new HttpIngestService({ baseUrl: "http://ingest.local:8001/", fetch });

      await service.ingestText("7b502c3a1f48c8609ae212cdfb639dee39673f5e", "Hello world");

      expect(fetch).toHaveBeenCalledTimes(1);
      const [url, init] = fetch.mock.calls[0] ?? [];
      expect(url).toBe("http://ingest.local:8001/v1/ingest/text");
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({ "Content-Type": "application/json", Accept: "application/json" });
      expect(init?.body).toBe(
        '{"file_name":"7b502c3a1f48c8609ae212cdfb639dee39673f5e","text":"Hello world"}',
      );
    });

    it("submits empty text", async () => {
      const fetch = fetchReturning(() => new Response(null, { status: 200 }));
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      await service.ingestText("da39a3ee5e6b4b0d3255bfef95601890afd80709", "");

      expect(fetch.mock.calls[0]?.[1]?.body).toBe(
        '{"file_name":"da39a3ee5e6b4b0d3255bfef95601890afd80709","text":""}',
      );
    });

    it("raises ExternalServiceError on a server error", async () => {
      const fetch = fetchReturning(
        () => new Response("vector store unavailable", { status: 503, statusText: "Service Unavailable" }),
      );
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      const err: unknown = await service.ingestText("doc-1", "text").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExternalServiceError);
      expect(err instanceof ExternalServiceError && err.message).toBe(
        "Ingestion of doc-1 failed: 503 Service Unavailable",
      );
      expect(err instanceof ExternalServiceError && err.details).toEqual({
        status: 503,
        documentId: "doc-1",
        response: "vector store unavailable",
      });
    });

    it("maps a missing endpoint to NotFoundError", async () => {
      const fetch = fetchReturning(() => new Response("", { status: 404 }));
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      await expect(service.ingestText("doc-1", "text")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("propagates network failures", async () => {
      const fetch = vi.fn(async (_url: string): Promise<Response> => {
        throw new TypeError("fetch failed");
      });
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      await expect(service.ingestText("doc-1", "text")).rejects.toThrow("fetch failed");
    });
  });

  describe("healthCheck", () => {
    it("returns true on 2xx", async () => {
      const fetch = fetchReturning(() => new Response('{"status":"ok"}', { status: 200 }));
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      expect(await service.healthCheck()).toBe(true);
      expect(fetch.mock.calls[0]?.[0]).toBe("http://ingest.local/health");
    });

    it("returns false on non-2xx", async () => {
      const fetch = fetchReturning(() => new Response("", { status: 500 }));
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      expect(await service.healthCheck()).toBe(false);
    });

    it("returns false when unreachable", async () => {
      const fetch = vi.fn(async (_url: string): Promise<Response> => {
        throw new TypeError("fetch failed");
      });
      const service = new HttpIngestService({ baseUrl: "http://ingest.local", fetch });

      expect(await service.healthCheck()).toBe(false);
      await expect(service.assertHealthy()).rejects.toThrow(
        "Ingestion service at http://ingest.local is not healthy",
      );
    });
  });
});

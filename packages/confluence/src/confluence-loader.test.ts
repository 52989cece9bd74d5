import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError, NotFoundError } from "@spacefeed/errors";
import { createLogger } from "@spacefeed/logger";
import { ConfluenceClient } from "./confluence-client.js";
import { ConfluenceLoader } from "./confluence-loader.js";
import { createFakeConfluence, FAKE_BASE_URL, type FakeSpace } from "./testing/fake-confluence.js";

vi.mock("pdf-parse/lib/pdf-parse.js", () => ({
  default: async (buffer: Buffer) => ({ text: ` Handbook from ${buffer.toString()} `, numpages: 1 }),
}));
vi.mock("mammoth", () => ({
  default: {
    extractRawText: async ({ buffer }: { buffer: Buffer }) => ({ value: `Spec from ${buffer.toString()}`, messages: [] }),
  },
}));

const logger = createLogger({ level: "silent" });

const DOCX = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const engineering: FakeSpace = {
  key: "ENG",
  name: "Engineering",
  pages: [
    {
      id: "101",
      title: "Runbook",
      storage: "<h1>Runbook</h1><p>Restart the worker.</p>",
      when: "2024-05-01T10:00:00.000Z",
      attachments: [
        { id: "att-1", title: "steps.md", mediaType: "text/markdown", body: "1. Drain\n2. Restart" },
        { id: "att-2", title: "diagram.png", mediaType: "image/png", body: "PNG" },
        { id: "att-3", title: "blank.txt", mediaType: "text/plain", body: "   " },
      ],
    },
    { id: "102", title: "On-call", storage: "<p>Rotation &amp; escalation</p>" },
    { id: "103", title: "Empty", storage: "" },
  ],
};

async function loaderFor(spaces: FakeSpace[]) {
  const fake = createFakeConfluence({ spaces });
  const client = await ConfluenceClient.connect({
    baseUrl: FAKE_BASE_URL,
    username: "svc-ingest",
    apiKey: "test-api-key",
    fetch: fake.fetch,
  });
  return { loader: new ConfluenceLoader(client, { logger }), requests: fake.requests };
}

describe("ConfluenceLoader", () => {
  it("loads pages in order with attachment text appended", async () => {
    const { loader } = await loaderFor([engineering]);

    const documents = await loader.load({
      spaceKey: "ENG",
      includeAttachments: true,
      limit: 2,
      maxPages: 100,
    });

    expect(documents).toEqual([
      {
        content: "Runbook Restart the worker.\n\n1. Drain\n2. Restart",
        metadata: {
          id: "101",
          title: "Runbook",
          source: "https://wiki.example.com/spaces/ENG/pages/101",
          when: "2024-05-01T10:00:00.000Z",
          attachmentCount: 1,
        },
      },
      {
        content: "Rotation & escalation",
        metadata: {
          id: "102",
          title: "On-call",
          source: "https://wiki.example.com/spaces/ENG/pages/102",
          when: undefined,
          attachmentCount: 0,
        },
      },
      {
        content: "",
        metadata: {
          id: "103",
          title: "Empty",
          source: "https://wiki.example.com/spaces/ENG/pages/103",
          when: undefined,
          attachmentCount: 0,
        },
      },
    ]);
  });

  it("skips attachments entirely when not requested", async () => {
    const { loader, requests } = await loaderFor([engineering]);

    const documents = await loader.load({
      spaceKey: "ENG",
      includeAttachments: false,
      limit: 50,
      maxPages: 100,
    });

    expect(documents.map((d) => d.content)).toEqual(["Runbook Restart the worker.", "Rotation & escalation", ""]);
    expect(requests.some((r) => r.includes("/child/attachment"))).toBe(false);
  });

  it("pages through the space using the configured limit", async () => {
    const { loader, requests } = await loaderFor([engineering]);

    await loader.load({ spaceKey: "ENG", includeAttachments: false, limit: 2, maxPages: 100 });

    expect(requests.filter((r) => r.startsWith("/rest/api/content?"))).toEqual([
      "/rest/api/content?spaceKey=ENG&type=page&status=current&start=0&limit=2&expand=body.storage%2Cversion",
      "/rest/api/content?spaceKey=ENG&type=page&status=current&start=2&limit=2&expand=body.storage%2Cversion",
      "/rest/api/content?spaceKey=ENG&type=page&status=current&start=3&limit=2&expand=body.storage%2Cversion",
    ]);
  });

  it("stops at the page ceiling", async () => {
    const { loader } = await loaderFor([engineering]);

    const documents = await loader.load({
      spaceKey: "ENG",
      includeAttachments: false,
      limit: 50,
      maxPages: 2,
    });

    expect(documents.map((d) => d.metadata.id)).toEqual(["101", "102"]);
  });

  it("never downloads unsupported attachments", async () => {
    const { loader, requests } = await loaderFor([engineering]);

    await loader.load({ spaceKey: "ENG", includeAttachments: true, limit: 50, maxPages: 100 });

    const downloads = requests.filter((r) => r.startsWith("/download/"));
    expect(downloads).toEqual(["/download/attachments/101/att-1", "/download/attachments/101/att-3"]);
  });

  it("returns no documents for an empty space", async () => {
    const { loader } = await loaderFor([{ key: "EMPTY", name: "Empty", pages: [] }]);

    await expect(
      loader.load({ spaceKey: "EMPTY", includeAttachments: true, limit: 50, maxPages: 100 }),
    ).resolves.toEqual([]);
  });

  it("raises NotFoundError for an unknown space", async () => {
    const { loader } = await loaderFor([engineering]);

    await expect(
      loader.load({ spaceKey: "MISSING", includeAttachments: true, limit: 50, maxPages: 100 }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("appends text extracted from PDF and Word attachments", async () => {
    const { loader, requests } = await loaderFor([
      {
        key: "DOC",
        name: "Docs",
        pages: [
          {
            id: "301",
            title: "Policies",
            storage: "<p>Body</p>",
            attachments: [
              { id: "att-pdf", title: "handbook.pdf", mediaType: "application/pdf", body: "pdf-bytes" },
              { id: "att-docx", title: "spec.docx", mediaType: DOCX, body: "docx-bytes" },
            ],
          },
        ],
      },
    ]);

    const [document] = await loader.load({ spaceKey: "DOC", includeAttachments: true, limit: 50, maxPages: 100 });

    expect(document?.content).toBe("Body\n\nHandbook from pdf-bytes\n\nSpec from docx-bytes");
    expect(document?.metadata.attachmentCount).toBe(2);
    expect(requests.filter((r) => r.startsWith("/download/"))).toEqual([
      "/download/attachments/301/att-pdf",
      "/download/attachments/301/att-docx",
    ]);
  });

  it("skips an attachment whose download is not found and keeps loading", async () => {
    const { loader } = await loaderFor([
      {
        key: "OPS",
        name: "Ops",
        pages: [
          {
            id: "201",
            title: "First",
            storage: "<p>First</p>",
            attachments: [
              { id: "gone", title: "gone.txt", mediaType: "text/plain", body: "", downloadStatus: 404 },
              { id: "kept", title: "kept.txt", mediaType: "text/plain", body: "Kept notes" },
            ],
          },
          { id: "202", title: "Second", storage: "<p>Second</p>" },
        ],
      },
    ]);

    const documents = await loader.load({ spaceKey: "OPS", includeAttachments: true, limit: 50, maxPages: 100 });

    expect(documents.map((d) => d.content)).toEqual(["First\n\nKept notes", "Second"]);
    expect(documents[0]?.metadata.attachmentCount).toBe(1);
  });

  it("aborts the load when an attachment download fails otherwise", async () => {
    const { loader } = await loaderFor([
      {
        key: "OPS",
        name: "Ops",
        pages: [
          {
            id: "201",
            title: "First",
            storage: "<p>First</p>",
            attachments: [{ id: "broken", title: "broken.txt", mediaType: "text/plain", body: "", downloadStatus: 500 }],
          },
        ],
      },
    ]);

    await expect(
      loader.load({ spaceKey: "OPS", includeAttachments: true, limit: 50, maxPages: 100 }),
    ).rejects.toBeInstanceOf(ExternalServiceError);
  });
});

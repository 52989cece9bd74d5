import type { z } from "zod";
import {
  AppError,
  ExternalServiceError,
  UnauthorizedError,
  errorForStatus,
} from "@spacefeed/errors";
import {
  attachmentSchema,
  currentUserSchema,
  pageSchema,
  pagedSchema,
  spaceSchema,
  type ConfluenceAttachment,
  type ConfluencePage,
  type ConfluenceSpace,
  type ConfluenceUser,
} from "./schemas.js";
import type { PageWindow } from "./pagination.js";

const SERVICE = "confluence";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ConfluenceClientConfig {
  /** Site root, e.g. `https://example.atlassian.net/wiki` or `https://confluence.example.com`. */
  baseUrl: string;
  username: string;
  apiKey: string;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
}

const pageListSchema = pagedSchema(pageSchema);
const attachmentListSchema = pagedSchema(attachmentSchema);

/**
 * Thin Confluence REST client authenticated with HTTP Basic credentials.
 * Obtain instances through {@link ConfluenceClient.connect}, which proves the
 * credentials work before anything else is requested.
 */
export class ConfluenceClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly fetchFn: FetchFn;

  private constructor(config: ConfluenceClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${config.username}:${config.apiKey}`).toString("base64")}`;
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Create a client and validate its session against `/rest/api/user/current`.
   * Any failure to establish the session, including an unreachable base URL,
   * surfaces as an UnauthorizedError.
   */
  static async connect(config: ConfluenceClientConfig): Promise<ConfluenceClient> {
    const client = new ConfluenceClient(config);
    let user: ConfluenceUser;

    try {
      user = await client.getCurrentUser();
    } catch (err: unknown) {
      if (err instanceof UnauthorizedError) throw err;
      throw new UnauthorizedError(`Unable to establish a Confluence session at ${client.baseUrl}`, {
        details: { cause: err instanceof Error ? err.message : String(err) },
      });
    }

    // Cloud answers unauthenticated requests with an anonymous user rather than a 401
    if (user.type === "anonymous") {
      throw new UnauthorizedError(`Confluence at ${client.baseUrl} did not accept the credentials`);
    }

    return client;
  }

  async getCurrentUser(): Promise<ConfluenceUser> {
    return this.getJson("/rest/api/user/current", currentUserSchema);
  }

  async getSpace(spaceKey: string): Promise<ConfluenceSpace> {
    return this.getJson(`/rest/api/space/${encodeURIComponent(spaceKey)}`, spaceSchema);
  }

  async listPages(spaceKey: string, window: PageWindow): Promise<ConfluencePage[]> {
    const params = new URLSearchParams({
      spaceKey,
      type: "page",
      status: "current",
      start: String(window.start),
      limit: String(window.limit),
      expand: "body.storage,version",
    });
    const data = await this.getJson(`/rest/api/content?${params}`, pageListSchema);
    return data.results;
  }

  async listAttachments(pageId: string, window: PageWindow): Promise<ConfluenceAttachment[]> {
    const params = new URLSearchParams({
      start: String(window.start),
      limit: String(window.limit),
    });
    const data = await this.getJson(
      `/rest/api/content/${encodeURIComponent(pageId)}/child/attachment?${params}`,
      attachmentListSchema,
    );
    return data.results;
  }

  async downloadAttachment(attachment: ConfluenceAttachment): Promise<Uint8Array> {
    const response = await this.request(attachment._links.download, "*/*");
    return new Uint8Array(await response.arrayBuffer());
  }

  /** Absolute web URL for a link Confluence returns relative to the site root. */
  resolveLink(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private async getJson<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T>> {
    const response = await this.request(path, "application/json");
    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);

    if (!parsed.success) {
      throw new ExternalServiceError(`Unexpected Confluence response from ${path}`, SERVICE, {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }

    return parsed.data;
  }

  private async request(path: string, accept: string): Promise<Response> {
    let response: Response;

    try {
      response = await this.fetchFn(this.resolveLink(path), {
        method: "GET",
        headers: {
          Accept: accept,
          Authorization: this.authorization,
        },
      });
    } catch (err: unknown) {
      if (AppError.isAppError(err)) throw err;
      throw new ExternalServiceError(
        `Confluence request to ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
        SERVICE,
      );
    }

    if (!response.ok) {
      const retryAfter = Number(response.headers.get("retry-after") ?? 0);
      throw errorForStatus(SERVICE, response.status, `Confluence ${String(response.status)} on ${path}`, {
        retryAfter: Number.isFinite(retryAfter) ? retryAfter : 0,
        details: { path },
      });
    }

    return response;
  }
}

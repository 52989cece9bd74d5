export { HttpIngestService } from "./http-ingest-service.js";
export type { HttpIngestServiceConfig, FetchFn } from "./http-ingest-service.js";

export { SpaceIngestor, toIngestionRequest, DEFAULT_PAGE_LIMIT, DEFAULT_MAX_PAGES } from "./space-ingestor.js";
export type { SpaceIngestorOptions } from "./space-ingestor.js";

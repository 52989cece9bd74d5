export type { DocumentMetadata, SourceDocument, IngestionRequest } from "./document.js";
export type { LoadOptions, IContentSource, IIngestService } from "./connector.js";
export type { ParseResult } from "./pipeline.js";
export type {
  LogLevel,
  IngestConfig,
  ConfluenceConfig,
  LoaderConfig,
  IngestServiceConfig,
} from "./config.js";

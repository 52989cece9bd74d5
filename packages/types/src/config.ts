export type LogLevel = "debug" | "info" | "warn" | "error";

export interface IngestConfig {
  logLevel: LogLevel;
  logFile?: string;
  confluence: ConfluenceConfig;
  loader: LoaderConfig;
  ingest: IngestServiceConfig;
}

export interface ConfluenceConfig {
  url: string;
  username: string;
  apiKey: string;
  spaceKey: string;
}

export interface LoaderConfig {
  includeAttachments: boolean;
  limit: number;
  maxPages: number;
}

export interface IngestServiceConfig {
  url: string;
}

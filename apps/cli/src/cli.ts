import { parseArgs } from "node:util";
import type { IngestConfig } from "@spacefeed/types";
import { parseCliConfig } from "@spacefeed/config";
import { ConfluenceClient, ConfluenceLoader, type FetchFn } from "@spacefeed/confluence";
import { SpaceIngestor } from "@spacefeed/core";
import { ValidationError } from "@spacefeed/errors";
import { HttpIngestService } from "@spacefeed/ingest-client";
import { createChildLogger, redactValue, type Logger } from "@spacefeed/logger";

export const USAGE = `Usage: spacefeed --confluence-url <url> --confluence-username <user>
                 --confluence-apikey <key> --confluence-space <key> [options]

Feed every page of a Confluence space into the ingestion service.

Options:
  --confluence-url <url>        Confluence site root (required)
  --confluence-username <user>  Confluence username (required)
  --confluence-apikey <key>     Confluence API key (required)
  --confluence-space <key>      Space to ingest (required)
  --ingest-url <url>            Ingestion service base URL (default: http://localhost:8001)
  --page-limit <n>              Results requested per API call (default: 1000)
  --max-pages <n>               Maximum pages retrieved from the space (default: 10000000)
  --skip-attachments            Do not append attachment text to pages
  --log-file <path>             Also append log lines to this file
  --log-level <level>           debug | info | warn | error (default: info)
  -h, --help                    Show this help
`;

export type CliCommand = { kind: "help" } | { kind: "ingest"; config: IngestConfig };

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        "confluence-url": { type: "string" },
        "confluence-username": { type: "string" },
        "confluence-apikey": { type: "string" },
        "confluence-space": { type: "string" },
        "ingest-url": { type: "string" },
        "page-limit": { type: "string" },
        "max-pages": { type: "string" },
        "skip-attachments": { type: "boolean" },
        "log-file": { type: "string" },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err: unknown) {
    // parseArgs throws a TypeError for anything it cannot accept
    throw new ValidationError("Invalid command-line arguments", {
      arguments: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Parse argv (without the node and script entries) into a command.
 * Unknown flags and bad values raise a ValidationError.
 */
export function parseCli(argv: string[]): CliCommand {
  const { help, ...flags } = readFlags(argv);
  if (help) return { kind: "help" };

  return { kind: "ingest", config: parseCliConfig(flags) };
}

export interface RunDependencies {
  logger: Logger;
  /** Replaces the global fetch for both Confluence and the ingestion service. */
  fetch?: FetchFn;
}

/**
 * Wire the ingestion pass: ingestion service health -> Confluence session ->
 * loader -> SpaceIngestor. Every failure propagates to the caller.
 */
export async function run(config: IngestConfig, deps: RunDependencies): Promise<void> {
  const logger = createChildLogger(deps.logger, { run: "ingest" });

  const ingestService = new HttpIngestService({ baseUrl: config.ingest.url, fetch: deps.fetch });
  await ingestService.assertHealthy();

  logger.info(
    { url: config.confluence.url, username: redactValue("username", config.confluence.username) },
    "Connecting to Confluence",
  );
  const client = await ConfluenceClient.connect({
    baseUrl: config.confluence.url,
    username: config.confluence.username,
    apiKey: config.confluence.apiKey,
    fetch: deps.fetch,
  });

  const loader = new ConfluenceLoader(client, { logger });
  const ingestor = new SpaceIngestor(ingestService, loader, {
    limit: config.loader.limit,
    maxPages: config.loader.maxPages,
    includeAttachments: config.loader.includeAttachments,
    logger,
  });

  await ingestor.ingestSpace(config.confluence.spaceKey);
}

import { z } from "zod";
import type { IngestConfig } from "@spacefeed/types";
import { ValidationError } from "@spacefeed/errors";
import { DEFAULT_MAX_PAGES, DEFAULT_PAGE_LIMIT } from "@spacefeed/core";

export const DEFAULT_INGEST_URL = "http://localhost:8001";

const requiredString = (flag: string) =>
  z.string({ required_error: `--${flag} is required` }).min(1, `--${flag} must not be empty`);

const positiveInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform(Number)
    .pipe(z.number().int().positive());

/**
 * Zod schema for the command-line flags. Keys are the flag names without the
 * leading dashes; values are what `util.parseArgs` produces.
 */
export const cliSchema = z
  .object({
    // ---------- Confluence ----------
    "confluence-url": requiredString("confluence-url").url("--confluence-url must be a URL"),
    "confluence-username": requiredString("confluence-username"),
    "confluence-apikey": requiredString("confluence-apikey"),
    "confluence-space": requiredString("confluence-space"),

    // ---------- Loader ----------
    "page-limit": positiveInt(DEFAULT_PAGE_LIMIT),
    "max-pages": positiveInt(DEFAULT_MAX_PAGES),
    "skip-attachments": z.boolean().default(false),

    // ---------- Ingestion service ----------
    "ingest-url": z.string().url("--ingest-url must be a URL").default(DEFAULT_INGEST_URL),

    // ---------- Logging ----------
    "log-file": z.string().min(1).optional(),
    "log-level": z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .strict();

export type CliValues = z.input<typeof cliSchema>;

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Validate raw flag values and return a strongly-typed {@link IngestConfig}.
 *
 * Throws a ValidationError whose `fields` maps each rejected flag to the
 * first problem zod reported for it.
 */
export function parseCliConfig(values: Record<string, unknown>): IngestConfig {
  const result = cliSchema.safeParse(values);

  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      const flag =
        issue.code === "unrecognized_keys" ? issue.keys.join(", ") : issue.path.join(".") || "arguments";
      fields[flag] ??= issue.message;
    }
    throw new ValidationError("Invalid command-line arguments", fields);
  }

  const parsed = result.data;

  return {
    logLevel: parsed["log-level"],
    logFile: parsed["log-file"],

    confluence: {
      url: trimTrailingSlash(parsed["confluence-url"]),
      username: parsed["confluence-username"],
      apiKey: parsed["confluence-apikey"],
      spaceKey: parsed["confluence-space"],
    },

    loader: {
      includeAttachments: !parsed["skip-attachments"],
      limit: parsed["page-limit"],
      maxPages: parsed["max-pages"],
    },

    ingest: {
      url: trimTrailingSlash(parsed["ingest-url"]),
    },
  };
}

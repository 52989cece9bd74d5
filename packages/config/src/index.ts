export {
  cliSchema,
  parseCliConfig,
  DEFAULT_INGEST_URL,
} from "./cli-config.js";
export type { CliValues } from "./cli-config.js";

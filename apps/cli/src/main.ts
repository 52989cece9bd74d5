import { AppError } from "@spacefeed/errors";
import { createLogger } from "@spacefeed/logger";
import { USAGE, parseCli, run } from "./cli.js";

async function main(): Promise<void> {
  const command = parseCli(process.argv.slice(2));

  if (command.kind === "help") {
    process.stdout.write(USAGE);
    return;
  }

  const { config } = command;
  const logger = createLogger({ level: config.logLevel, service: "spacefeed", logFile: config.logFile });

  try {
    await run(config, { logger });
  } catch (err: unknown) {
    logger.fatal(AppError.isAppError(err) ? err.toLogObject() : { err }, "Ingestion failed");
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (AppError.isAppError(err)) {
    console.error(`[spacefeed] ${err.message}`, err.toLogObject());
  } else {
    console.error("[spacefeed] Fatal error:", err);
  }
  process.stderr.write(`\n${USAGE}`);
  process.exitCode = 1;
});

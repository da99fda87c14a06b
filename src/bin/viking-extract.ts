#!/usr/bin/env node
import { runCli } from "../cli";
import { logger } from "../monitoring/logger";

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ error: (error as Error).message }, "Unexpected CLI failure");
    process.exit(1);
  });

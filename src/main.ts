#!/usr/bin/env node
import { runCli } from "./cli/commands.js";
import { MailsiftError } from "./core/errors.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger();

runCli(process.argv.slice(2), logger).catch((err: unknown) => {
  if (err instanceof MailsiftError) {
    logger.error({ code: err.code }, err.message);
    console.error(`mailsift: ${err.message}`);
  } else {
    logger.fatal({ error: err }, "Unexpected failure");
  }
  process.exitCode = 1;
});

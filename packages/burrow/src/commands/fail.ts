import chalk from "chalk";
import { isBurrowError } from "@burrow/common";

import type { CommandContext } from "../command";
import { EXIT_FATAL } from "../report";

/**
 * Reports an error thrown before the install could produce a report.
 */
export function fail(context: CommandContext, action: string, e: unknown): void {
  const { logger } = context;
  logger.info(`💥 ${chalk.redBright(`An error occurred while ${action}.`)}`);
  if (isBurrowError(e)) {
    logger.info(e.message);
    logger.debug(JSON.stringify(e.toJSON()));
  } else if (e instanceof Error) {
    logger.info(e.message);
    if (e.stack) {
      logger.debug(e.stack);
    }
  } else {
    logger.info(String(e));
  }
  context.setExitCode(EXIT_FATAL);
}

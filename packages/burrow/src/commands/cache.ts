import chalk from "chalk";
import { loadConfig } from "@burrow/common";
import { PackageCache } from "@burrow/package-cache";

import type { Command } from "../command";
import { EXIT_OK } from "../report";
import { fail } from "./fail";

export const init: Command = (program, context) => {
  const cache = program.command("cache").description("inspect or clear the package cache");

  cache
    .command("info")
    .description("print the cache location and size")
    .action(async () => {
      const { logger, cwd } = context;
      try {
        const config = await loadConfig(cwd, { logger });
        const stats = await new PackageCache(config.cacheDir, { logger }).stats();
        logger.info(`📁 ${chalk.cyanBright(config.cacheDir)}`);
        logger.info(`${stats.entries} packages, ${stats.bytes} bytes`);
        context.setExitCode(EXIT_OK);
      } catch (e) {
        fail(context, "reading the cache", e);
      }
    });

  cache
    .command("clean")
    .description("remove every cached package")
    .action(async () => {
      const { logger, cwd } = context;
      try {
        const config = await loadConfig(cwd, { logger });
        await new PackageCache(config.cacheDir, { logger }).clear();
        logger.info(chalk.greenBright(`🧹 Cleared ${config.cacheDir}`));
        context.setExitCode(EXIT_OK);
      } catch (e) {
        fail(context, "clearing the cache", e);
      }
    });
};

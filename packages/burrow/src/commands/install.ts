import chalk from "chalk";
import { loadConfig, measure } from "@burrow/common";

import type { Command } from "../command";
import { installProject } from "../project";
import { exitCodeFor, renderReport } from "../report";
import { fail } from "./fail";

type InstallFlags = {
  frozenLockfile?: boolean;
  production?: boolean;
  ignoreScripts?: boolean;
};

export const init: Command = (program, context) => {
  const cmd = program
    .command("install")
    .alias("i")
    .description("install the dependencies of the project")
    .option(
      "--frozen-lockfile",
      "Will not update the lockfile, and fail if the lockfile is out of date",
      false
    )
    .option("--production", "skip devDependencies", false)
    .option("--ignore-scripts", "do not run lifecycle scripts", false);

  cmd.action(async () => {
    const flags = cmd.opts<InstallFlags>();
    const { logger, cwd } = context;
    const took = measure();
    try {
      logger.info(chalk.cyanBright("📦 Running burrow install."));
      const config = await loadConfig(cwd, { logger });
      const { report } = await installProject({
        cwd,
        config,
        registry: context.createRegistry(config, logger),
        frozenLockfile: flags.frozenLockfile,
        production: flags.production,
        ignoreScripts: flags.ignoreScripts,
        scriptRunner: context.scriptRunner,
        logger,
      });
      renderReport(report, logger, took());
      context.setExitCode(exitCodeFor(report));
    } catch (e) {
      fail(context, "installing", e);
    }
  });
};

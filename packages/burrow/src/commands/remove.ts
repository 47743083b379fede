import { loadConfig, measure } from "@burrow/common";

import type { Command } from "../command";
import { removeDependencies } from "../project";
import { exitCodeFor, renderReport } from "../report";
import { fail } from "./fail";

export const init: Command = (program, context) => {
  const cmd = program
    .command("remove")
    .alias("rm")
    .description("remove packages from the dependencies")
    .argument("<packages...>", "package names")
    .option("--ignore-scripts", "do not run lifecycle scripts", false);

  cmd.action(async (packages: string[]) => {
    const flags = cmd.opts<{ ignoreScripts?: boolean }>();
    const { logger, cwd } = context;
    const took = measure();
    try {
      const config = await loadConfig(cwd, { logger });
      const { report } = await removeDependencies(packages, {
        cwd,
        config,
        registry: context.createRegistry(config, logger),
        ignoreScripts: flags.ignoreScripts,
        scriptRunner: context.scriptRunner,
        logger,
      });
      renderReport(report, logger, took());
      context.setExitCode(exitCodeFor(report));
    } catch (e) {
      fail(context, "removing packages", e);
    }
  });
};

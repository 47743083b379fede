import { loadConfig, measure } from "@burrow/common";

import type { Command } from "../command";
import { addDependencies } from "../project";
import { exitCodeFor, renderReport } from "../report";
import { fail } from "./fail";

export const init: Command = (program, context) => {
  const cmd = program
    .command("add")
    .description("add packages to the dependencies and install them")
    .argument("<packages...>", "name, name@range or name@tag")
    .option("-D, --dev", "add to devDependencies", false)
    .option("--ignore-scripts", "do not run lifecycle scripts", false);

  cmd.action(async (packages: string[]) => {
    const flags = cmd.opts<{ dev?: boolean; ignoreScripts?: boolean }>();
    const { logger, cwd } = context;
    const took = measure();
    try {
      const config = await loadConfig(cwd, { logger });
      const { report } = await addDependencies(packages, {
        cwd,
        config,
        registry: context.createRegistry(config, logger),
        dev: flags.dev,
        ignoreScripts: flags.ignoreScripts,
        scriptRunner: context.scriptRunner,
        logger,
      });
      renderReport(report, logger, took());
      context.setExitCode(exitCodeFor(report));
    } catch (e) {
      fail(context, "adding packages", e);
    }
  });
};

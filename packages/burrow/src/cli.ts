import { Command as Commander } from "commander";
import { logger } from "@burrow/common";
import type { Logger } from "@burrow/common";
import type { ScriptRunner } from "@burrow/package-installer";

import type { Command, CommandContext } from "./command";
import * as add from "./commands/add";
import * as cache from "./commands/cache";
import * as install from "./commands/install";
import * as remove from "./commands/remove";
import { createRegistry } from "./project";
import { EXIT_OK } from "./report";

interface CLIOptions {
  logger?: Logger;
  cwd?: string;
  createRegistry?: CommandContext["createRegistry"];
  scriptRunner?: ScriptRunner;
}

export class CLI {
  command: Commander;
  options: Required<Omit<CLIOptions, "scriptRunner">> & Pick<CLIOptions, "scriptRunner">;
  commands: { init: Command }[];
  private exitCode = EXIT_OK;

  constructor(command: Commander, opts: CLIOptions = {}) {
    this.command = command;
    this.options = {
      logger,
      cwd: process.cwd(),
      createRegistry,
      ...opts,
    };
    this.commands = [install, add, remove, cache];
  }

  /**
   * Parses `argv` and runs the matching command. Resolves with the exit code.
   */
  async run(
    argv: string[] = process.argv,
    from: "node" | "user" = "node"
  ): Promise<number> {
    this.command.name("burrow").description("Installs the dependencies of JavaScript projects");
    const context: CommandContext = {
      logger: this.options.logger,
      cwd: this.options.cwd,
      createRegistry: this.options.createRegistry,
      scriptRunner: this.options.scriptRunner,
      setExitCode: (code) => {
        this.exitCode = code;
      },
    };
    for (const command of this.commands) {
      command.init(this.command, context);
    }

    await this.command.parseAsync(argv, { from });
    return this.exitCode;
  }
}

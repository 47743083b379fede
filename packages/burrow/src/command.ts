import type { Command as CommanderCommand } from "commander";
import type { BurrowConfig, Logger } from "@burrow/common";
import type { ScriptRunner } from "@burrow/package-installer";
import type { RegistryClient } from "@burrow/registry";

export interface CommandContext {
  logger: Logger;
  cwd: string;
  /**
   * Builds the registry client for a loaded configuration.
   */
  createRegistry: (config: BurrowConfig, logger: Logger) => RegistryClient;
  scriptRunner?: ScriptRunner;
  setExitCode: (code: number) => void;
}

export interface Command {
  (program: CommanderCommand, context: CommandContext): void;
}

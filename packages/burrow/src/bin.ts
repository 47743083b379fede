#!/usr/bin/env node
import { Command } from "commander";

import { CLI } from "./cli";

export const main = async () => {
  const cli = new CLI(new Command());
  process.exitCode = await cli.run(process.argv);
};

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

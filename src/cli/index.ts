#!/usr/bin/env node
import { createRequire } from "node:module";
import { USAGE } from "./usage.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };
export { version };

type CommandModule = { default: (args: string[]) => Promise<void> };

const COMMANDS = {
  reset: () => import("./commands/reset.js"),
  copy: () => import("./commands/copy.js"),
  verify: () => import("./commands/verify.js"),
  prepare: () => import("./commands/prepare.js"),
} satisfies Record<string, () => Promise<CommandModule>>;
type Command = keyof typeof COMMANDS;

function isCommand(name: string): name is Command {
  return Object.hasOwn(COMMANDS, name);
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(USAGE);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const first = args[0];

  if (!first || first === "--help" || first === "-h") {
    printUsage();
    return;
  }
  if (first === "--version" || first === "-V") {
    // eslint-disable-next-line no-console
    console.log(version);
    return;
  }

  if (!isCommand(first)) {
    console.error(`Unknown command: ${first}`);
    printUsage();
    process.exitCode = 1;
    return;
  }

  // Pass remaining args (after command name) to the subcommand
  const mod = await COMMANDS[first]();
  await mod.default(args.slice(1));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

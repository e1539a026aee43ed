import { resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { copyDirectory } from "../../fs/copy.js";

export default async function copy(args: string[]): Promise<void> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: true,
  });

  const [source, destination] = positionals;
  if (!source || !destination) {
    console.error(chalk.red("Usage: fixdir copy <source> <destination>"));
    process.exitCode = 1;
    return;
  }

  await copyDirectory(resolve(source), resolve(destination));
  console.log(chalk.green(`Copied ${source} → ${destination}`));
}

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { resetDirectory } from "../../fs/reset.js";

export default async function reset(args: string[]): Promise<void> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: true,
  });

  const target = positionals[0];
  if (!target) {
    console.error(chalk.red("Usage: fixdir reset <path>"));
    process.exitCode = 1;
    return;
  }

  // Failures were already reported by the reset itself
  const result = await resetDirectory(resolve(target));
  switch (result.status) {
    case "created":
      console.log(chalk.green(`Created ${result.path}`));
      break;
    case "cleaned":
      console.log(chalk.green(`Cleaned ${result.path}`));
      break;
    case "cleanup-failed":
    case "failed":
      process.exitCode = 1;
      break;
  }
}

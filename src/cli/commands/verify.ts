import { resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { verifyCopy } from "../../fs/verify.js";

export default async function verify(args: string[]): Promise<void> {
  const { positionals } = parseArgs({
    args,
    allowPositionals: true,
    strict: true,
  });

  const [source, destination] = positionals;
  if (!source || !destination) {
    console.error(chalk.red("Usage: fixdir verify <source> <destination>"));
    process.exitCode = 1;
    return;
  }

  const issues = await verifyCopy(resolve(source), resolve(destination));
  if (issues.length === 0) {
    console.log(chalk.green(`${destination} matches ${source}`));
    return;
  }

  for (const issue of issues) {
    console.log(chalk.red(`  error: ${issue.path}: ${issue.issue}`));
  }
  process.exitCode = 1;
}

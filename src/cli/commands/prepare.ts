import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { loadConfig, ConfigError } from "../../config/loader.js";
import {
  prepareFixture,
  resolveFixtures,
  removerFromConfig,
  PrepareError,
} from "../../fixtures/prepare.js";
import type { PreparedFixture } from "../../fixtures/prepare.js";

export interface PrepareCommandOptions {
  configPath: string;
  names: string[];
}

export async function runPrepare(opts: PrepareCommandOptions): Promise<PreparedFixture[]> {
  const config = await loadConfig(opts.configPath);
  const fixtures = resolveFixtures(config, dirname(opts.configPath), opts.names);
  const remover = removerFromConfig(config);

  const prepared: PreparedFixture[] = [];
  for (const fixture of fixtures) {
    prepared.push(await prepareFixture(fixture, { remover }));
  }
  return prepared;
}

export default async function prepare(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string" },
    },
    allowPositionals: true,
    strict: true,
  });

  const configPath = resolve(values.config ?? "fixtures.toml");

  let prepared: PreparedFixture[];
  try {
    prepared = await runPrepare({ configPath, names: positionals });
  } catch (err) {
    if (err instanceof ConfigError || err instanceof PrepareError) {
      console.error(chalk.red(err.message));
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  if (prepared.length === 0) {
    console.log(chalk.yellow("No fixtures declared."));
    return;
  }

  for (const p of prepared) {
    console.log(chalk.green(`Prepared ${p.name}: ${p.workdir} (${p.integrity})`));
  }
}

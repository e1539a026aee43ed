import { resolve } from "node:path";
import { resetDirectory } from "../fs/reset.js";
import { copyDirectory } from "../fs/copy.js";
import { verifyCopy } from "../fs/verify.js";
import { commandRemover } from "../fs/remover.js";
import type { Remover } from "../fs/remover.js";
import { hashDirectory } from "../utils/hash.js";
import type { Logger } from "../utils/logger.js";
import type { FixturesConfig } from "../config/schema.js";

export class PrepareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PrepareError";
  }
}

/** A fixture entry with absolute paths. */
export interface Fixture {
  name: string;
  source: string;
  workdir: string;
  verify: boolean;
}

export interface PrepareOptions {
  remover?: Remover;
  logger?: Logger;
}

export interface PreparedFixture {
  name: string;
  source: string;
  workdir: string;
  /** hashDirectory() of the workdir after copying */
  integrity: string;
}

/**
 * Pick fixtures from the config, resolving paths against `configDir`.
 * No names selects every fixture, in config order.
 */
export function resolveFixtures(
  config: FixturesConfig,
  configDir: string,
  names: string[] = [],
): Fixture[] {
  const unknown = names.filter((n) => !config.fixtures.some((f) => f.name === n));
  if (unknown.length > 0) {
    const known = config.fixtures.map((f) => f.name);
    throw new PrepareError(
      `Unknown fixture(s): ${unknown.join(", ")}. Known fixtures: ${known.join(", ") || "(none)"}`,
    );
  }

  const selected = names.length === 0
    ? config.fixtures
    : config.fixtures.filter((f) => names.includes(f.name));

  return selected.map((f) => ({
    name: f.name,
    source: resolve(configDir, f.source),
    workdir: resolve(configDir, f.workdir),
    verify: f.verify,
  }));
}

export function removerFromConfig(config: FixturesConfig): Remover | undefined {
  return config.remover
    ? commandRemover(config.remover.command, config.remover.args)
    : undefined;
}

/**
 * Reset the fixture's workdir and copy its source tree into it.
 * Any reset failure, cleanup included, is fatal here.
 */
export async function prepareFixture(
  fixture: Fixture,
  opts: PrepareOptions = {},
): Promise<PreparedFixture> {
  const reset = await resetDirectory(fixture.workdir, opts);
  if (!reset.ok) {
    throw new PrepareError(
      `Fixture "${fixture.name}": reset of ${fixture.workdir} ${reset.status === "failed" ? "failed" : "could not clean the directory"}`,
    );
  }

  await copyDirectory(fixture.source, fixture.workdir);

  if (fixture.verify) {
    const issues = await verifyCopy(fixture.source, fixture.workdir);
    if (issues.length > 0) {
      const lines = issues.map((i) => `  - ${i.path}: ${i.issue}`).join("\n");
      throw new PrepareError(`Fixture "${fixture.name}": copy does not match source:\n${lines}`);
    }
  }

  return {
    name: fixture.name,
    source: fixture.source,
    workdir: fixture.workdir,
    integrity: await hashDirectory(fixture.workdir),
  };
}

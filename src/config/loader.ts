import { readFile } from "node:fs/promises";
import { parse as parseTOML } from "smol-toml";
import { fixturesConfigSchema } from "./schema.js";
import type { FixturesConfig } from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export async function loadConfig(filePath: string): Promise<FixturesConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = parseTOML(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid TOML in ${filePath}: ${message}`);
  }

  const result = fixturesConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${filePath}:\n${issues}`);
  }

  const seen = new Set<string>();
  for (const fixture of result.data.fixtures) {
    if (seen.has(fixture.name)) {
      throw new ConfigError(`Duplicate fixture name in ${filePath}: "${fixture.name}"`);
    }
    seen.add(fixture.name);
  }

  return result.data;
}

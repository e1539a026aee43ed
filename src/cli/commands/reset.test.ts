import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { mkdtemp, mkdir, writeFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import chalk from "chalk";
import reset from "./reset.js";

describe("fixdir reset", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fixdir-cli-reset-"));
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a missing directory", async () => {
    const work = join(dir, "work");
    await reset([work]);

    expect(log).toHaveBeenCalledWith(chalk.green(`Created ${work}`));
    expect(await readdir(work)).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });

  it("cleans an existing directory", async () => {
    const work = join(dir, "work");
    await mkdir(work);
    await writeFile(join(work, "stale.txt"), "old");

    await reset([work]);

    expect(log).toHaveBeenCalledWith(chalk.green(`Cleaned ${work}`));
    expect(await readdir(work)).toEqual([]);
  });

  it("sets exit code 1 when the directory cannot be created", async () => {
    await writeFile(join(dir, "file"), "x");
    const work = join(dir, "file", "work");

    await reset([work]);

    expect(error).toHaveBeenCalledWith(chalk.red(`Error trying to create directory: ${work}`));
    expect(process.exitCode).toBe(1);
  });

  it("prints usage without a path", async () => {
    await reset([]);
    expect(error).toHaveBeenCalledWith(chalk.red("Usage: fixdir reset <path>"));
    expect(process.exitCode).toBe(1);
  });
});

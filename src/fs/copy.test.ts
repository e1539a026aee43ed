import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, writeFile, readFile, rm } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { copyDirectory } from "./copy.js";
import { resetDirectory } from "./reset.js";

describe("copyDirectory", () => {
  let dir: string;
  let src: string;
  let dest: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fixdir-copy-"));
    src = join(dir, "src");
    dest = join(dir, "dest");
    await mkdir(join(src, "a"), { recursive: true });
    await mkdir(join(src, "b"), { recursive: true });
    await writeFile(join(src, "a", "x.txt"), "x contents");
    await writeFile(join(src, "b", "y.txt"), "y contents");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("copies nested files into a missing destination", async () => {
    await copyDirectory(src, dest);

    expect(await readFile(join(dest, "a", "x.txt"), "utf-8")).toBe("x contents");
    expect(await readFile(join(dest, "b", "y.txt"), "utf-8")).toBe("y contents");
  });

  it("keeps destination-only files and overwrites matching ones", async () => {
    await mkdir(join(dest, "a"), { recursive: true });
    await writeFile(join(dest, "a", "x.txt"), "stale");
    await writeFile(join(dest, "local.txt"), "mine");

    await copyDirectory(src, dest);

    expect(await readFile(join(dest, "a", "x.txt"), "utf-8")).toBe("x contents");
    expect(await readFile(join(dest, "local.txt"), "utf-8")).toBe("mine");
    expect(existsSync(join(dest, "b", "y.txt"))).toBe(true);
  });

  it("copies empty subdirectories", async () => {
    await mkdir(join(src, "empty"));
    await copyDirectory(src, dest);
    expect(existsSync(join(dest, "empty"))).toBe(true);
  });

  it("propagates the error for a missing source", async () => {
    await expect(copyDirectory(join(dir, "missing"), dest)).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  it("fills a freshly reset work directory with identical bytes", async () => {
    const fixtures = join(dir, "fixtures", "data");
    const work = join(dir, "tmp", "work");
    const bytes = Buffer.from([0, 1, 2, 254, 255]);
    await mkdir(join(fixtures, "nested"), { recursive: true });
    await writeFile(join(fixtures, "config.json"), '{"name":"fixture"}');
    await writeFile(join(fixtures, "nested", "file.bin"), bytes);

    const result = await resetDirectory(work);
    expect(result.ok).toBe(true);
    await copyDirectory(fixtures, work);

    expect(await readFile(join(work, "config.json"), "utf-8")).toBe('{"name":"fixture"}');
    expect((await readFile(join(work, "nested", "file.bin"))).equals(bytes)).toBe(true);
  });
});

import { stat } from "node:fs/promises";
import { join } from "node:path";
import { hashFile, listFiles } from "../utils/hash.js";

export interface CopyIssue {
  /** Relative to both roots */
  path: string;
  issue: "missing" | "modified" | "not-a-file";
}

/**
 * Check that every file under `source` is present in `destination` with
 * identical contents. Files only present in `destination` are not issues.
 */
export async function verifyCopy(
  source: string,
  destination: string,
): Promise<CopyIssue[]> {
  const issues: CopyIssue[] = [];

  for (const relPath of await listFiles(source)) {
    const target = join(destination, relPath);

    let s;
    try {
      s = await stat(target);
    } catch {
      issues.push({ path: relPath, issue: "missing" });
      continue;
    }

    if (!s.isFile()) {
      issues.push({ path: relPath, issue: "not-a-file" });
      continue;
    }

    const [expected, actual] = await Promise.all([
      hashFile(join(source, relPath)),
      hashFile(target),
    ]);
    if (expected !== actual) {
      issues.push({ path: relPath, issue: "modified" });
    }
  }

  return issues;
}

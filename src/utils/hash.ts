import { createHash } from "node:crypto";
import { readFile, readdir } from "node:fs/promises";
import { join, relative } from "node:path";

/**
 * Compute a deterministic integrity hash of a directory.
 *
 * Algorithm:
 * 1. Walk all files, sorted alphabetically by relative path
 * 2. SHA-256 each file's contents
 * 3. Concatenate "<relative-path>\0<hex-hash>\n"
 * 4. SHA-256 the concatenation
 * 5. Base64-encode with "sha256-" prefix
 */
export async function hashDirectory(dirPath: string): Promise<string> {
  const files = await listFiles(dirPath);

  const parts: string[] = [];
  for (const relPath of files) {
    const fileHash = await hashFile(join(dirPath, relPath));
    parts.push(`${relPath}\0${fileHash}\n`);
  }

  const combined = parts.join("");
  const digest = createHash("sha256").update(combined).digest("base64");
  return `sha256-${digest}`;
}

/**
 * SHA-256 hex hash of a file's contents.
 */
export async function hashFile(filePath: string): Promise<string> {
  const content = await readFile(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/**
 * List every regular file under `dirPath`, as sorted paths relative to it.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const files = await walkFiles(dirPath);
  return files.map((f) => relative(dirPath, f)).sort();
}

async function walkFiles(dir: string): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = await walkFiles(fullPath);
      results.push(...nested);
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
    // Skip symlinks, sockets, etc.
  }

  return results;
}

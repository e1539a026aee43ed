import { cp } from "node:fs/promises";

/**
 * Copy a directory recursively into `dest`, creating it if needed.
 * Files at matching relative paths are overwritten; files only present
 * in `dest` are left alone. Filesystem errors propagate unchanged.
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  await cp(src, dest, { recursive: true, force: true });
}

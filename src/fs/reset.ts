import { mkdir, readdir, stat } from "node:fs/promises";
import { removeInProcess } from "./remover.js";
import type { Remover, RemoveOutcome } from "./remover.js";
import { consoleLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export class CreationError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Error trying to create directory: ${path}`, options);
    this.name = "CreationError";
  }
}

export class CleanupFailure extends Error {
  constructor(
    public readonly path: string,
    public readonly exitCode: number | null,
    public readonly detail: string,
  ) {
    super(`Error trying to clean directory: ${path}`);
    this.name = "CleanupFailure";
  }
}

export type ResetResult =
  | { ok: true; status: "created" | "cleaned"; path: string }
  | { ok: false; status: "cleanup-failed"; path: string; error: CleanupFailure }
  | { ok: false; status: "failed"; path: string; error: CreationError };

export interface ResetOptions {
  remover?: Remover;
  logger?: Logger;
}

/**
 * Ensure `path` exists as an empty directory.
 *
 * A missing path is created along with its parents. An existing one is
 * removed and recreated. Failures never reject: a creation failure yields
 * `failed`. When removal does not leave the path empty (the remover
 * reported failure, threw, or exited 0 with entries still present) the
 * warning is logged, the directory is recreated anyway and the result is
 * `cleanup-failed`.
 */
export async function resetDirectory(
  path: string,
  opts: ResetOptions = {},
): Promise<ResetResult> {
  const remover = opts.remover ?? removeInProcess;
  const logger = opts.logger ?? consoleLogger;

  if (!(await isDirectory(path))) {
    const error = await createDirectory(path);
    if (error) {
      logger.error(error.message);
      return { ok: false, status: "failed", path, error };
    }
    return { ok: true, status: "created", path };
  }

  const removal = await runRemover(remover, path);
  let cleanupFailure: CleanupFailure | undefined;
  if (!removal.ok) {
    cleanupFailure = new CleanupFailure(path, removal.exitCode, removal.message);
    logger.warn(`${cleanupFailure.message} (${removal.message})`);
  }

  const error = await createDirectory(path);
  if (error) {
    logger.error(error.message);
    return { ok: false, status: "failed", path, error };
  }

  // A remover can report success and still leave entries behind
  if (!cleanupFailure) {
    const detail = await checkEmpty(path);
    if (detail) {
      cleanupFailure = new CleanupFailure(path, 0, detail);
      logger.warn(`${cleanupFailure.message} (${detail})`);
    }
  }

  if (cleanupFailure) {
    return { ok: false, status: "cleanup-failed", path, error: cleanupFailure };
  }
  return { ok: true, status: "cleaned", path };
}

async function runRemover(remover: Remover, path: string): Promise<RemoveOutcome> {
  try {
    return await remover(path);
  } catch (err) {
    return { ok: false, exitCode: null, message: err instanceof Error ? err.message : String(err) };
  }
}

/** Returns why `path` cannot be confirmed empty, or null when it is. */
async function checkEmpty(path: string): Promise<string | null> {
  try {
    const entries = await readdir(path);
    return entries.length > 0 ? "directory not empty after removal" : null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function createDirectory(path: string): Promise<CreationError | null> {
  try {
    await mkdir(path, { recursive: true });
    return null;
  } catch (err) {
    return new CreationError(path, { cause: err });
  }
}

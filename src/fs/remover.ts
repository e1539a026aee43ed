import { rm } from "node:fs/promises";
import { exec, ExecError } from "../utils/exec.js";

export type RemoveOutcome =
  | { ok: true }
  | { ok: false; exitCode: number | null; message: string };

/**
 * Deletes a directory tree. Removers report failure as a value;
 * they never reject.
 */
export type Remover = (path: string) => Promise<RemoveOutcome>;

/** Recursive, forced delete in the current process. */
export const removeInProcess: Remover = async (path) => {
  try {
    await rm(path, { recursive: true, force: true });
    return { ok: true };
  } catch (err) {
    return { ok: false, exitCode: null, message: err instanceof Error ? err.message : String(err) };
  }
};

/**
 * Delete through an external command, invoked as `command ...args <path>`.
 * Exit code 0 is success; anything else is reported with its code, and a
 * command that could not be started at all with a null code.
 */
export function commandRemover(command: string, args: string[] = []): Remover {
  return async (path) => {
    try {
      await exec(command, [...args, path]);
      return { ok: true };
    } catch (err) {
      return err instanceof ExecError
        ? { ok: false, exitCode: err.exitCode, message: err.message }
        : { ok: false, exitCode: null, message: err instanceof Error ? err.message : String(err) };
    }
  };
}

import { execFile } from "node:child_process";

export class ExecError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ExecError";
  }
}

interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Run a command and return stdout/stderr.
 *
 * Every failure rejects with an ExecError. `exitCode` is the process's exit
 * code, or null when the command never ran. Arguments execFile refuses
 * (a NUL byte, say) count as never ran.
 */
export function exec(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  const command = [cmd, ...args].join(" ");
  const env = { ...process.env, ...opts.env };

  return new Promise((resolve, reject) => {
    try {
      execFile(cmd, args, { cwd: opts.cwd, env, maxBuffer: 10 * 1024 * 1024 }, (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr });
          return;
        }
        // Spawn failures carry a string code such as ENOENT
        const exitCode = typeof err.code === "number" ? err.code : null;
        reject(new ExecError(`${command} failed: ${stderr.trim() || err.message}`, exitCode, stderr));
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      reject(new ExecError(`${command} could not be started: ${message}`, null, ""));
    }
  });
}

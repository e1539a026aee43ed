export { exec, ExecError } from "./exec.js";
export { hashDirectory, hashFile, listFiles } from "./hash.js";
export { consoleLogger } from "./logger.js";
export type { ExecOptions } from "./exec.js";
export type { Logger } from "./logger.js";

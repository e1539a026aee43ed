export { resetDirectory, CreationError, CleanupFailure } from "./reset.js";
export type { ResetResult, ResetOptions } from "./reset.js";
export { copyDirectory } from "./copy.js";
export { removeInProcess, commandRemover } from "./remover.js";
export type { Remover, RemoveOutcome } from "./remover.js";
export { verifyCopy } from "./verify.js";
export type { CopyIssue } from "./verify.js";

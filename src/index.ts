export { resetDirectory, CreationError, CleanupFailure, copyDirectory, removeInProcess, commandRemover, verifyCopy } from "./fs/index.js";
export type { ResetResult, ResetOptions, Remover, RemoveOutcome, CopyIssue } from "./fs/index.js";
export { loadConfig, ConfigError, fixturesConfigSchema } from "./config/index.js";
export type { FixturesConfig, FixtureEntry, RemoverConfig } from "./config/index.js";
export { prepareFixture, resolveFixtures, removerFromConfig, PrepareError } from "./fixtures/index.js";
export type { Fixture, PrepareOptions, PreparedFixture } from "./fixtures/index.js";
export { exec, ExecError, hashDirectory, hashFile, listFiles, consoleLogger } from "./utils/index.js";
export type { Logger } from "./utils/index.js";

export { loadConfig, ConfigError } from "./loader.js";
export { fixturesConfigSchema } from "./schema.js";
export type { FixturesConfig, FixtureEntry, RemoverConfig } from "./schema.js";

export { prepareFixture, resolveFixtures, removerFromConfig, PrepareError } from "./prepare.js";
export type { Fixture, PrepareOptions, PreparedFixture } from "./prepare.js";

import { z } from "zod/v4";

/** Fixture names are used on the command line: alphanumeric, dots, hyphens, underscores. */
const fixtureNameSchema = z.string().regex(
  /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/,
  "Fixture names must start with alphanumeric and contain only [a-zA-Z0-9._-]",
);

/**
 * A fixture copies `source` into a freshly reset `workdir`.
 * Both paths are relative to the directory holding fixtures.toml.
 */
const fixtureSchema = z.object({
  name: fixtureNameSchema,
  source: z.string().min(1, "Fixture source is required"),
  workdir: z.string().min(1, "Fixture workdir is required"),
  verify: z.boolean().default(false),
});

export type FixtureEntry = z.infer<typeof fixtureSchema>;

/** External delete command, run as `command ...args <path>`. */
const removerSchema = z.object({
  command: z.string().min(1, "Remover command is required"),
  args: z.array(z.string()).default([]),
});

export type RemoverConfig = z.infer<typeof removerSchema>;

export const fixturesConfigSchema = z.object({
  version: z.literal(1),
  remover: removerSchema.optional(),
  fixtures: z.array(fixtureSchema).default([]),
});

export type FixturesConfig = z.infer<typeof fixturesConfigSchema>;

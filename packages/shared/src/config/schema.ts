import { z } from 'zod';

const ExtensionSchema = z
  .string()
  .regex(/^\.\w+$/, 'must be a dot followed by word characters, e.g. ".cxx"');

/**
 * Maps each recognized source extension to the extension its file is renamed to.
 * Only files whose extension is a key are migrated.
 */
export const ExtensionMapSchema = z
  .record(ExtensionSchema, ExtensionSchema)
  .refine((map) => Object.keys(map).length > 0, {
    message: 'at least one extension must be mapped',
  });

export type ExtensionMap = z.infer<typeof ExtensionMapSchema>;

export const DEFAULT_EXTENSION_MAP: ExtensionMap = {
  '.cxx': '.cc',
  '.h': '.h',
};

export const DiscoveryModeSchema = z.enum(['walk', 'glob']);
export type DiscoveryMode = z.infer<typeof DiscoveryModeSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Directory to migrate. Usually supplied on the command line. */
  root: z.string().min(1).optional(),
  /** `walk` recurses the whole tree; `glob` matches `*<ext>` in the root directory only */
  mode: DiscoveryModeSchema.default('walk'),
  extensions: ExtensionMapSchema.default(DEFAULT_EXTENSION_MAP),
  /** gitignore-style patterns, relative to the root, pruned from discovery */
  excludes: z.array(z.string()).default([]),
  dryRun: z.boolean().default(false),
  /** JSONL file receiving one event per committed step */
  journal: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

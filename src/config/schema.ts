import { z } from 'zod';

/**
 * Centralised configuration schema for keyed-tree.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Warn when a node is attached while its previous parent still lists it
  TREE_WARN_ON_REATTACH: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .or(z.boolean())
    .default(true),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Validate an arbitrary record against the configuration schema.
 * Missing entries fall back to their defaults.
 */
export function parseConfig(input: Record<string, unknown>): AppConfig {
  return configSchema.parse(input);
}

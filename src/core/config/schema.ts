/**
 * Configuration schema for dialect-forge.config.yaml.
 */
import { z } from 'zod';

/** Logger verbosity. */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Project configuration. Every field has a default, so an empty file is valid.
 */
export const ConfigSchema = z.object({
  /** Registry entry matched when no rule is given. */
  entry_rule: z.string().min(1).default('StatementSegment'),
  /** Reference nesting limit for the matcher. */
  max_depth: z.number().int().positive().default(200),
  log_level: LogLevelSchema.default('info'),
  /** Glob patterns of YAML dialect definitions, relative to the project root. */
  definitions: z.array(z.string()).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration schema for polyglot tree builds.
 */
import { z } from 'zod';

export const LanguageIdSchema = z.enum(['python', 'javascript', 'java', 'c']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  /** Maximum nesting depth of evaluate links */
  max_depth: z.number().int().min(0).default(32),
  /** Omit file links that point back to a file already being built */
  detect_cycles: z.boolean().default(true),
  /** Extra target-language spellings, e.g. `py: python` */
  language_aliases: z.record(z.string(), LanguageIdSchema).default({}),
  log_level: LogLevelSchema.default('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;

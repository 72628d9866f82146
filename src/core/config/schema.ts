/**
 * Schema of `.repoaudit.yaml`.
 */
import { z } from 'zod';
import { SEVERITIES } from '../report/severity.js';

export const OutputFormatSchema = z.enum(['human', 'json', 'yaml']);

export const SeveritySchema = z.enum(SEVERITIES);

/** Extra directories to prune; same form as analyser exclude rules. */
const ExcludePatternSchema = z
  .string()
  .min(1)
  .refine((pattern) => pattern.endsWith('/'), { message: 'exclude patterns must end with "/"' });

export const ConfigSchema = z.object({
  /** Analyser or aggregator ids to leave out */
  skip: z.array(z.string()).default([]),
  /** Categories to leave out */
  skip_types: z.array(z.string()).default([]),
  exclude: z.array(ExcludePatternSchema).default([]),
  min_severity: SeveritySchema.default('info'),
  format: OutputFormatSchema.default('human'),
  /** Representative metadata values only, no raw results */
  plain: z.boolean().default(false),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;

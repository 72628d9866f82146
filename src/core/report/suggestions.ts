/**
 * Remediation advice for report messages, read from data/suggestions.yaml.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { findPackageRoot } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';

const SuggestionSchema = z
  .object({
    /** Exact message text */
    name: z.string().optional(),
    /** Regular expression anchored at the start of the message text */
    match: z.string().optional(),
    suggestion: z.string(),
  })
  .refine((item) => item.name !== undefined || item.match !== undefined, {
    message: 'either name or match is required',
  });

const SuggestionListSchema = z.array(SuggestionSchema);

export type SuggestionRule = z.infer<typeof SuggestionSchema>;

export function getSuggestionsPath(): string {
  return path.join(findPackageRoot(import.meta.url), 'data', 'suggestions.yaml');
}

let cached: Promise<SuggestionRule[]> | undefined;

/**
 * Load the bundled suggestion rules once per process.
 */
export function loadSuggestions(filePath: string = getSuggestionsPath()): Promise<SuggestionRule[]> {
  if (filePath !== getSuggestionsPath()) {
    return loadYamlWithSchema(filePath, SuggestionListSchema);
  }
  cached ??= loadYamlWithSchema(filePath, SuggestionListSchema);
  return cached;
}

/**
 * Find the advice for a message text, if any.
 */
export function findSuggestion(text: string, rules: readonly SuggestionRule[]): string | undefined {
  for (const rule of rules) {
    if (rule.name !== undefined && rule.name === text) {
      return rule.suggestion;
    }
    if (rule.match !== undefined && new RegExp(`^(?:${rule.match})`).test(text)) {
      return rule.suggestion;
    }
  }
  return undefined;
}

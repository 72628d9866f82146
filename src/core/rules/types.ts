/**
 * Rule type definitions.
 */

/** Include rules route entries to analysers; exclude rules prune directories. */
export type RuleKind = 'include' | 'exclude';

/**
 * Patterns contributed by one source (an analyser id, or `config` for
 * user-supplied excludes).
 */
export interface RuleContribution {
  owner?: string;
  patterns: readonly string[];
}

/**
 * Rules barrel file.
 */
export { Rule } from './rule.js';
export { RuleSet } from './rule-set.js';
export type { RuleKind, RuleContribution } from './types.js';

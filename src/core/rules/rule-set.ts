/**
 * Rule sets: one Rule per distinct pattern string, owners merged.
 */
import { Rule } from './rule.js';
import type { RuleContribution, RuleKind } from './types.js';

export class RuleSet implements Iterable<Rule> {
  private readonly rules = new Map<string, Rule>();

  constructor(readonly kind: RuleKind) {}

  /**
   * Build a rule set from every contribution.
   *
   * @throws InvalidRuleError on the first pattern that cannot be used
   */
  static build(kind: RuleKind, contributions: Iterable<RuleContribution>): RuleSet {
    const set = new RuleSet(kind);
    for (const { owner, patterns } of contributions) {
      for (const pattern of patterns) {
        set.add(pattern, owner);
      }
    }
    return set;
  }

  /**
   * Add a pattern, sharing the existing rule when the same string was
   * already contributed.
   */
  add(pattern: string, owner?: string): Rule {
    const existing = this.rules.get(pattern);
    if (existing) {
      if (owner) {
        existing.addOwner(owner);
      }
      return existing;
    }

    const rule = Rule.parse(pattern, owner, this.kind);
    this.rules.set(pattern, rule);
    return rule;
  }

  get(pattern: string): Rule | undefined {
    return this.rules.get(pattern);
  }

  get size(): number {
    return this.rules.size;
  }

  /** Rules that apply to directory entries. */
  directoryRules(): Rule[] {
    return [...this.rules.values()].filter((rule) => rule.isDirectory);
  }

  /** Rules that apply to file entries. */
  fileRules(): Rule[] {
    return [...this.rules.values()].filter((rule) => !rule.isDirectory);
  }

  patterns(): string[] {
    return [...this.rules.keys()];
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.rules.values();
  }
}

/**
 * Tests for rule sets.
 */
import { describe, it, expect } from 'vitest';
import { RuleSet } from '../../../../src/core/rules/rule-set.js';
import { InvalidRuleError } from '../../../../src/utils/errors.js';

describe('RuleSet', () => {
  it('shares one rule between analysers contributing the same pattern', () => {
    const set = RuleSet.build('include', [
      { owner: 'alpha', patterns: ['*.md'] },
      { owner: 'beta', patterns: ['*.md', '/LICENSE'] },
    ]);

    expect(set.size).toBe(2);
    expect([...(set.get('*.md')?.owners ?? [])]).toEqual(['alpha', 'beta']);
    expect([...(set.get('/LICENSE')?.owners ?? [])]).toEqual(['beta']);
  });

  it('splits directory and file rules', () => {
    const set = RuleSet.build('include', [{ owner: 'a', patterns: ['/docs/', '*.py', '/.git/'] }]);
    expect(set.directoryRules().map((rule) => rule.source)).toEqual(['/docs/', '/.git/']);
    expect(set.fileRules().map((rule) => rule.source)).toEqual(['*.py']);
  });

  it('fails on a non-directory exclude pattern', () => {
    expect(() =>
      RuleSet.build('exclude', [{ owner: 'a', patterns: ['build/', 'node_modules'] }])
    ).toThrow(InvalidRuleError);
  });

  it('accepts contributions without an owner', () => {
    const set = RuleSet.build('exclude', [{ patterns: ['dist/'] }]);
    expect(set.patterns()).toEqual(['dist/']);
    expect(set.get('dist/')?.owners.size).toBe(0);
  });
});

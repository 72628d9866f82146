/**
 * Tests for the plug-in registry.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PluginRegistry } from '../../../../src/core/registry/plugin-registry.js';
import type { Aggregator, Analyser, Category } from '../../../../src/core/registry/types.js';
import { ErrorCodes, InvalidRuleError } from '../../../../src/utils/errors.js';

const createAnalyser = (category: Category, name = 'Test'): Analyser => ({
  name,
  category,
  includes: () => ['*.txt'],
});

const createAggregator = (category: Category): Aggregator => ({
  name: 'Aggregator',
  category,
});

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = new PluginRegistry();
  });

  describe('register', () => {
    it('derives identifiers from type names', () => {
      expect(registry.registerAnalyser('CodePython', () => createAnalyser('code'))).toBe('code_python');
      expect(registry.registerAggregator('VersionControl', () => createAggregator('version_control'))).toBe(
        'version_control'
      );
    });

    it('rejects colliding identifiers', () => {
      registry.registerAnalyser('CodePython', () => createAnalyser('code'));
      expect(() => registry.registerAnalyser('code_python', () => createAnalyser('code'))).toThrow(InvalidRuleError);
    });

    it('reports the collision code', () => {
      registry.registerAnalyser('Git', () => createAnalyser('version_control'));
      try {
        registry.registerAnalyser('git', () => createAnalyser('version_control'));
        expect.unreachable();
      } catch (error) {
        expect(error).toMatchObject({ code: ErrorCodes.DUPLICATE_ID });
      }
    });

    it('keeps analyser and aggregator identifiers apart', () => {
      registry.registerAnalyser('License', () => createAnalyser('license'));
      expect(() => registry.registerAggregator('License', () => createAggregator('license'))).not.toThrow();
    });

    it('names both type names in the collision details', () => {
      registry.registerAnalyser('CodePython', () => createAnalyser('code'));
      expect(() => registry.registerAnalyser('Code_Python', () => createAnalyser('code'))).toThrow(
        'Duplicate analyser identifier "code_python" (CodePython and Code_Python)'
      );
    });
  });

  describe('discover', () => {
    it('returns plug-ins in registration order', () => {
      registry.registerAnalyser('Readme', () => createAnalyser('documentation'));
      registry.registerAnalyser('License', () => createAnalyser('license'));
      expect([...registry.discoverAnalysers().keys()]).toEqual(['readme', 'license']);
    });

    it('instantiates each plug-in once and caches the result', () => {
      const factory = vi.fn(() => createAnalyser('license'));
      registry.registerAnalyser('License', factory);

      const first = registry.discoverAnalysers();
      const second = registry.discoverAnalysers();

      expect(second).toBe(first);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('refreshes the cache after a registration', () => {
      registry.registerAnalyser('License', () => createAnalyser('license'));
      const before = registry.discoverAnalysers();
      registry.registerAnalyser('Git', () => createAnalyser('version_control'));
      const after = registry.discoverAnalysers();

      expect(after).not.toBe(before);
      expect(after.get('license')).toBe(before.get('license'));
      expect(after.size).toBe(2);
    });

    it('clears everything', () => {
      registry.registerAnalyser('License', () => createAnalyser('license'));
      registry.registerAggregator('License', () => createAggregator('license'));
      registry.clear();
      expect(registry.discoverAnalysers().size).toBe(0);
      expect(registry.discoverAggregators().size).toBe(0);
    });
  });

  describe('filter', () => {
    beforeEach(() => {
      registry.registerAnalyser('License', () => createAnalyser('license'));
      registry.registerAnalyser('Git', () => createAnalyser('version_control'));
      registry.registerAnalyser('CodePython', () => createAnalyser('code'));
      registry.registerAnalyser('CodeJupyter', () => createAnalyser('code'));
    });

    it('drops skipped ids', () => {
      const kept = registry.filter(registry.discoverAnalysers(), ['git']);
      expect([...kept.keys()]).toEqual(['license', 'code_python', 'code_jupyter']);
    });

    it('drops skipped categories', () => {
      const kept = registry.filter(registry.discoverAnalysers(), [], ['code']);
      expect([...kept.keys()]).toEqual(['license', 'git']);
    });

    it('accepts category display names in any case', () => {
      const all = registry.discoverAnalysers();
      expect([...registry.filter(all, [], ['Version Control']).keys()]).not.toContain('git');
      expect([...registry.filter(all, [], ['VersionControl']).keys()]).not.toContain('git');
      expect([...registry.filter(all, [], ['LICENSE']).keys()]).not.toContain('license');
    });

    it('returns everything without skip lists', () => {
      expect(registry.filter(registry.discoverAnalysers()).size).toBe(4);
    });
  });
});

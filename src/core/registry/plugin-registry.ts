/**
 * Registry of analysers and aggregators.
 *
 * Plug-ins register a type name and a factory; the identifier is derived
 * from the type name once (`CodePython` -> `code_python`) and must be unique
 * within its kind. Discovery results are computed once and reused until the
 * registrations change.
 */
import { InvalidRuleError, ErrorCodes } from '../../utils/errors.js';
import { toIdentifier } from '../../utils/string.js';
import type { Aggregator, Analyser, Categorized } from './types.js';

/**
 * Factory function for creating plug-ins.
 * Used for lazy instantiation.
 */
export type PluginFactory<T> = () => T;

interface PluginRegistration<T> {
  type: string;
  factory: PluginFactory<T>;
  instance?: T;
}

type PluginKind = 'analyser' | 'aggregator';

/**
 * Forms a category filter may name a category by: `Version Control`,
 * `VersionControl`, `VERSION_CONTROL` and `version_control` all match
 * `version_control`.
 */
function typeForms(value: string): string[] {
  const lowered = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return [lowered, toIdentifier(value)];
}

export class PluginRegistry {
  private analysers = new Map<string, PluginRegistration<Analyser>>();
  private aggregators = new Map<string, PluginRegistration<Aggregator>>();
  private analyserCache: ReadonlyMap<string, Analyser> | undefined;
  private aggregatorCache: ReadonlyMap<string, Aggregator> | undefined;

  /**
   * Register an analyser.
   *
   * @param type Type name the identifier is derived from (e.g. 'CodePython')
   * @param factory Factory function to create the analyser
   * @returns The derived identifier
   * @throws InvalidRuleError when the identifier is already taken
   */
  registerAnalyser(type: string, factory: PluginFactory<Analyser>): string {
    const id = this.register('analyser', this.analysers, type, factory);
    this.analyserCache = undefined;
    return id;
  }

  /**
   * Register an aggregator.
   *
   * @param type Type name the identifier is derived from (e.g. 'VersionControl')
   * @param factory Factory function to create the aggregator
   * @returns The derived identifier
   * @throws InvalidRuleError when the identifier is already taken
   */
  registerAggregator(type: string, factory: PluginFactory<Aggregator>): string {
    const id = this.register('aggregator', this.aggregators, type, factory);
    this.aggregatorCache = undefined;
    return id;
  }

  private register<T>(
    kind: PluginKind,
    registrations: Map<string, PluginRegistration<T>>,
    type: string,
    factory: PluginFactory<T>
  ): string {
    const id = toIdentifier(type);
    const existing = registrations.get(id);
    if (existing) {
      throw new InvalidRuleError(
        ErrorCodes.DUPLICATE_ID,
        `Duplicate ${kind} identifier "${id}" (${existing.type} and ${type})`,
        { id, types: [existing.type, type] }
      );
    }
    registrations.set(id, { type, factory });
    return id;
  }

  /**
   * All registered analysers, keyed by identifier, in registration order.
   */
  discoverAnalysers(): ReadonlyMap<string, Analyser> {
    this.analyserCache ??= this.instantiate(this.analysers);
    return this.analyserCache;
  }

  /**
   * All registered aggregators, keyed by identifier, in registration order.
   */
  discoverAggregators(): ReadonlyMap<string, Aggregator> {
    this.aggregatorCache ??= this.instantiate(this.aggregators);
    return this.aggregatorCache;
  }

  private instantiate<T>(registrations: Map<string, PluginRegistration<T>>): ReadonlyMap<string, T> {
    const items = new Map<string, T>();
    for (const [id, registration] of registrations) {
      // Lazy instantiation
      registration.instance ??= registration.factory();
      items.set(id, registration.instance);
    }
    return items;
  }

  /**
   * Drop entries whose id is in `skip` or whose category is in `skipTypes`.
   */
  filter<T extends Categorized>(
    items: ReadonlyMap<string, T>,
    skip: Iterable<string> = [],
    skipTypes: Iterable<string> = []
  ): Map<string, T> {
    const skipIds = new Set(skip);
    const skipCategories = new Set([...skipTypes].flatMap(typeForms));

    const filtered = new Map<string, T>();
    for (const [id, item] of items) {
      if (skipIds.has(id)) {
        continue;
      }
      if (skipCategories.has(item.category)) {
        continue;
      }
      filtered.set(id, item);
    }
    return filtered;
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.analysers.clear();
    this.aggregators.clear();
    this.analyserCache = undefined;
    this.aggregatorCache = undefined;
  }
}

/**
 * Global plug-in registry instance.
 */
export const pluginRegistry = new PluginRegistry();

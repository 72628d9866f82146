import type { Aggregator, Category } from '../core/registry/types.js';

/**
 * Groups the code analysers. Has nothing to aggregate yet.
 */
export class CodeAggregator implements Aggregator {
  readonly name = 'Code';
  readonly category: Category = 'code';
}

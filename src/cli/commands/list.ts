import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { pluginRegistry } from '../../core/registry/plugin-registry.js';
import { CATEGORIES, type Category } from '../../core/registry/types.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface ListOptions {
  path: string;
  json?: boolean;
}

export interface AnalyserListing {
  id: string;
  name: string;
  category: Category;
  includes: string[];
  excludes: string[];
  analysesFiles: boolean;
}

export interface AggregatorListing {
  id: string;
  name: string;
  category: Category;
  aggregates: boolean;
}

/**
 * Describe every registered plug-in, with patterns as they apply to `root`.
 */
export async function describePlugins(
  root: string
): Promise<{ analysers: AnalyserListing[]; aggregators: AggregatorListing[] }> {
  const analysers: AnalyserListing[] = [];
  for (const [id, analyser] of pluginRegistry.discoverAnalysers()) {
    analysers.push({
      id,
      name: analyser.name,
      category: analyser.category,
      includes: [...(await analyser.includes(root))],
      excludes: analyser.excludes ? [...(await analyser.excludes(root))] : [],
      analysesFiles: analyser.analyseFile !== undefined,
    });
  }

  const aggregators: AggregatorListing[] = [];
  for (const [id, aggregator] of pluginRegistry.discoverAggregators()) {
    aggregators.push({
      id,
      name: aggregator.name,
      category: aggregator.category,
      aggregates: aggregator.aggregate !== undefined,
    });
  }

  return { analysers, aggregators };
}

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List registered analysers and aggregators')
    .option('--path <dir>', 'Repository the patterns are computed for', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions) => {
      try {
        await runList(options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runList(options: ListOptions): Promise<void> {
  const listing = await describePlugins(path.resolve(options.path));

  if (options.json) {
    console.log(JSON.stringify(listing, null, 2));
    return;
  }

  console.log(chalk.bold('ANALYSERS:'));
  for (const analyser of listing.analysers) {
    const category = CATEGORIES[analyser.category];
    console.log(`  ${chalk.cyan(analyser.id)} ${chalk.dim(`(${category})`)} ${analyser.name}`);
    console.log(`      includes: ${analyser.includes.join(', ')}`);
    if (analyser.excludes.length > 0) {
      console.log(`      excludes: ${analyser.excludes.join(', ')}`);
    }
  }

  console.log();
  console.log(chalk.bold('AGGREGATORS:'));
  for (const aggregator of listing.aggregators) {
    const category = CATEGORIES[aggregator.category];
    const note = aggregator.aggregates ? '' : chalk.dim(' (nothing to aggregate)');
    console.log(`  ${chalk.cyan(aggregator.id)} ${chalk.dim(`(${category})`)} ${aggregator.name}${note}`);
  }
}

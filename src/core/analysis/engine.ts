/**
 * Scan orchestrator.
 *
 * resolve root -> filter plug-ins -> build rule sets -> walk ->
 * per-file analysis -> post-passes -> aggregation -> metadata analysis
 */
import * as path from 'node:path';
import { AuditError, ErrorCodes, SystemError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { VERSION } from '../../version.js';
import { Report } from '../report/report.js';
import type { FileResults } from '../report/types.js';
import { pluginRegistry, type PluginRegistry } from '../registry/plugin-registry.js';
import type { Aggregator, Analyser, Category, MaybePromise } from '../registry/types.js';
import { RuleSet } from '../rules/rule-set.js';
import type { RuleContribution, RuleKind } from '../rules/types.js';
import { scan, throwIfAborted } from '../scanner/walker.js';
import type { ScanResult } from '../scanner/types.js';
import { resolveRoot } from './root.js';

const log = logger.child('analysis');

/** Owner recorded for exclude rules that come from configuration. */
export const CONFIG_SOURCE = 'config';

export interface AnalyseOptions {
  /** Analyser and aggregator ids to leave out */
  skip?: Iterable<string>;
  /** Categories to leave out */
  skipTypes?: Iterable<string>;
  /** Extra directory exclude patterns */
  exclude?: readonly string[];
  signal?: AbortSignal;
  /** Defaults to the process-wide registry */
  registry?: PluginRegistry;
  /** Recorded in the report stats; defaults to the package version */
  version?: string;
}

/**
 * Call an analyser's rule hook, reporting a failure against its id.
 *
 * @throws SystemError READ_ERROR when the hook fails with anything but an AuditError
 */
async function collectRules(
  id: string,
  kind: RuleKind,
  collect: () => MaybePromise<readonly string[]>
): Promise<readonly string[]> {
  try {
    return await collect();
  } catch (error) {
    if (error instanceof AuditError) {
      throw error;
    }
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Analyser ${id} failed to list ${kind} rules: ${errorMessage(error)}`,
      { analyser: id }
    );
  }
}

/**
 * Include rules of the active analysers.
 */
async function buildIncludes(root: string, analysers: ReadonlyMap<string, Analyser>): Promise<RuleSet> {
  const contributions: RuleContribution[] = [];
  for (const [id, analyser] of analysers) {
    const patterns = await collectRules(id, 'include', () => analyser.includes(root));
    contributions.push({ owner: id, patterns });
  }
  return RuleSet.build('include', contributions);
}

/**
 * Exclude rules of every registered analyser, skipped ones included, plus
 * configured excludes. Skipping an analyser must not make the walk descend
 * into the directories it prunes.
 *
 * @throws InvalidRuleError when a pattern is not in directory form
 */
async function buildExcludes(
  root: string,
  analysers: ReadonlyMap<string, Analyser>,
  extra: readonly string[]
): Promise<RuleSet> {
  const contributions: RuleContribution[] = [];
  for (const [id, analyser] of analysers) {
    if (analyser.excludes) {
      const patterns = await collectRules(id, 'exclude', () => analyser.excludes?.(root) ?? []);
      contributions.push({ owner: id, patterns });
    }
  }
  contributions.push({ owner: CONFIG_SOURCE, patterns: extra });
  return RuleSet.build('exclude', contributions);
}

async function runAnalyser(
  id: string,
  analyser: Analyser,
  root: string,
  paths: readonly string[],
  scanned: ScanResult,
  report: Report,
  signal: AbortSignal | undefined
): Promise<FileResults> {
  const writer = report.writer(id);
  const results: FileResults = new Map();

  if (!analyser.analyseFile) {
    log.debug(`${id}: no per-file analysis, cataloguing ${paths.length} file(s)`);
  }

  for (const relativePath of paths) {
    throwIfAborted(signal);
    if (!analyser.analyseFile) {
      results.set(relativePath, null);
      continue;
    }
    try {
      const result = await analyser.analyseFile(
        {
          root,
          path: relativePath,
          absolutePath: path.join(root, ...relativePath.split('/')),
          isDirectory: scanned.directories.has(relativePath),
        },
        writer
      );
      results.set(relativePath, result ?? null);
    } catch (error) {
      log.debug(`${id}: failed on ${relativePath}: ${errorMessage(error)}`);
      writer.addWarning(`Failed to analyse file: ${errorMessage(error)}`, relativePath);
      results.set(relativePath, null);
    }
  }

  if (analyser.analyseResults) {
    try {
      await analyser.analyseResults(results, writer);
    } catch (error) {
      log.debug(`${id}: post-pass failed: ${errorMessage(error)}`);
      writer.addWarning(`Analysis failed: ${errorMessage(error)}`);
    }
  }

  return results;
}

async function runAggregator(
  id: string,
  aggregator: Aggregator,
  report: Report,
  results: ReadonlyMap<string, FileResults>
): Promise<void> {
  if (!aggregator.aggregate) {
    log.debug(`${id}: no aggregation, skipped`);
    return;
  }
  const writer = report.writer(id);
  try {
    await aggregator.aggregate(writer, results);
  } catch (error) {
    log.debug(`${id}: aggregation failed: ${errorMessage(error)}`);
    writer.addWarning(`Analysis failed: ${errorMessage(error)}`);
  }
}

/**
 * Scan a repository and run every active analyser and aggregator over it.
 *
 * @throws InvalidPathError when `inputPath` is missing or not a directory
 * @throws InvalidRuleError when an exclude pattern is not in directory form
 * @throws SystemError SCAN_ABORTED when `options.signal` fires
 */
export async function analyse(inputPath: string, options: AnalyseOptions = {}): Promise<Report> {
  const registry = options.registry ?? pluginRegistry;
  const { signal } = options;

  const root = await resolveRoot(inputPath);
  log.debug(`Scanning ${root}`);

  const allAnalysers = registry.discoverAnalysers();
  const analysers = registry.filter(allAnalysers, options.skip, options.skipTypes);
  const aggregators = registry.filter(registry.discoverAggregators(), options.skip, options.skipTypes);

  const includes = await buildIncludes(root, analysers);
  const excludes = await buildExcludes(root, allAnalysers, options.exclude ?? []);

  const report = new Report(root, { version: options.version ?? VERSION });

  const scanned = await scan(root, includes, excludes, { signal });
  report.setScanStats({
    numDirs: scanned.stats.dirCount,
    numDirsExcluded: scanned.stats.dirExcludedCount,
    numFiles: scanned.stats.fileCount,
  });

  const byCategory = new Map<Category, Map<string, FileResults>>();
  for (const [id, analyser] of analysers) {
    const paths = scanned.files.get(id);
    if (!paths || paths.length === 0) {
      continue;
    }
    log.debug(`Running analyser ${id} on ${paths.length} file(s)`);
    const results = await runAnalyser(id, analyser, root, paths, scanned, report, signal);
    report.results.set(id, results);

    let category = byCategory.get(analyser.category);
    if (!category) {
      category = new Map();
      byCategory.set(analyser.category, category);
    }
    category.set(id, results);
  }

  for (const [id, aggregator] of aggregators) {
    throwIfAborted(signal);
    log.debug(`Running aggregator ${id}`);
    await runAggregator(id, aggregator, report, byCategory.get(aggregator.category) ?? new Map());
  }

  report.analyseMetadata();
  report.finalize();
  return report;
}

/**
 * Plug-in contracts: analysers and aggregators.
 *
 * Optional members are optional capabilities. The engine checks for them
 * before calling; a plug-in without `analyseFile` still has its files
 * catalogued, an aggregator without `aggregate` is skipped.
 */
import type { FileResults, ReportWriter } from '../report/types.js';

export const CATEGORIES = {
  code: 'Code',
  license: 'License',
  citation: 'Citation',
  version_control: 'Version Control',
  documentation: 'Documentation',
  packaging: 'Packaging',
  repository: 'Repository',
  community: 'Community',
  dependency: 'Dependency',
  metadata: 'Metadata',
  continuous_integration: 'Continuous Integration',
} as const;

export type Category = keyof typeof CATEGORIES;

/**
 * A matched entry handed to `analyseFile`.
 */
export interface AnalysedFile {
  /** Absolute repository root */
  root: string;
  /** Path relative to the root, `/`-separated */
  path: string;
  absolutePath: string;
  /** Entry was matched by a directory rule */
  isDirectory: boolean;
}

export type MaybePromise<T> = T | Promise<T>;

export interface Analyser<R = unknown> {
  /** Display name */
  readonly name: string;
  readonly category: Category;

  /**
   * Files and directories of interest.
   * May depend on the repository contents.
   */
  includes(root: string): MaybePromise<readonly string[]>;

  /**
   * Directories to prune from traversal. Every pattern must end with `/`.
   */
  excludes?(root: string): MaybePromise<readonly string[]>;

  /**
   * Process one matched entry. Returning undefined records the entry
   * without a result.
   */
  analyseFile?(file: AnalysedFile, report: ReportWriter): MaybePromise<R | undefined>;

  /**
   * Post-pass over every per-file result of this analyser.
   */
  analyseResults?(results: ReadonlyMap<string, R | null>, report: ReportWriter): MaybePromise<void>;
}

/**
 * Results of every analyser of one category, keyed by analyser id.
 */
export type CategoryResults = ReadonlyMap<string, FileResults>;

export interface Aggregator {
  readonly name: string;
  readonly category: Category;

  /**
   * Add category-level messages from the combined analyser results.
   */
  aggregate?(report: ReportWriter, results: CategoryResults): MaybePromise<void>;
}

/** Anything the registry can filter. */
export interface Categorized {
  readonly category: Category;
}

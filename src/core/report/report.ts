/**
 * The aggregate result of one scan.
 *
 * Owns the metadata store, the severity-leveled message log, the raw
 * per-analyser results and the run statistics. Analysers and aggregators
 * reach it only through a ReportWriter bound to their id.
 */
import { MetadataStore, formatMetadataValue } from '../metadata/store.js';
import type { AddMetadataOptions, MetadataInput } from '../metadata/types.js';
import { severitiesFrom, type Severity } from './severity.js';
import type { FileResults, Message, ReportDict, ReportStats, ReportWriter, StatsDict } from './types.js';

/** Source id of messages raised by the metadata analysis pass. */
export const METADATA_SOURCE = 'metadata';

export interface ReportOptions {
  version: string;
  /** Start of the run (defaults to now) */
  date?: Date;
}

function toPathList(paths: string | readonly string[] | undefined): string[] {
  if (paths === undefined) {
    return [];
  }
  const list = typeof paths === 'string' ? [paths] : paths;
  return [...new Set(list.filter((item) => item.length > 0))];
}

function emptyLog(): Record<Severity, Message[]> {
  return {
    info: [],
    suggestion: [],
    notice: [],
    warning: [],
    issue: [],
  };
}

export class Report {
  readonly metadata = new MetadataStore();
  readonly messages: Record<Severity, Message[]> = emptyLog();
  /** Raw results keyed by analyser id, in the order analysers ran */
  readonly results = new Map<string, FileResults>();
  readonly stats: ReportStats;

  constructor(readonly path: string, options: ReportOptions) {
    this.stats = {
      path,
      date: options.date ?? new Date(),
      version: options.version,
      numDirs: 0,
      numDirsExcluded: 0,
      numFiles: 0,
    };
  }

  /**
   * Record a metadata assertion. Values rejected by a format check become
   * Issues attributed to the same source and path.
   */
  addMetadata(
    source: string,
    key: string,
    value: MetadataInput,
    path?: string,
    options?: AddMetadataOptions
  ): void {
    const outcome = this.metadata.add(key, value, source, path, options);
    for (const rejected of outcome.rejected) {
      this.addIssue(source, `Invalid ${key} value: ${formatMetadataValue(rejected.value)}.`, path);
    }
  }

  addMessage(severity: Severity, source: string, text: string, paths?: string | readonly string[]): void {
    this.messages[severity].push({ text, source, paths: toPathList(paths) });
  }

  addIssue(source: string, text: string, paths?: string | readonly string[]): void {
    this.addMessage('issue', source, text, paths);
  }

  addWarning(source: string, text: string, paths?: string | readonly string[]): void {
    this.addMessage('warning', source, text, paths);
  }

  addNotice(source: string, text: string, paths?: string | readonly string[]): void {
    this.addMessage('notice', source, text, paths);
  }

  addSuggestion(source: string, text: string, paths?: string | readonly string[]): void {
    this.addMessage('suggestion', source, text, paths);
  }

  addInfo(source: string, text: string, paths?: string | readonly string[]): void {
    this.addMessage('info', source, text, paths);
  }

  /**
   * Bind a write facade to one analyser or aggregator id.
   */
  writer(source: string): ReportWriter {
    return {
      root: this.path,
      source,
      metadata: this.metadata,
      addMetadata: (key, value, path, options) => this.addMetadata(source, key, value, path, options),
      addMessage: (severity, text, paths) => this.addMessage(severity, source, text, paths),
      addIssue: (text, paths) => this.addIssue(source, text, paths),
      addWarning: (text, paths) => this.addWarning(source, text, paths),
      addNotice: (text, paths) => this.addNotice(source, text, paths),
      addSuggestion: (text, paths) => this.addSuggestion(source, text, paths),
      addInfo: (text, paths) => this.addInfo(source, text, paths),
    };
  }

  /**
   * Messages at or above a severity, most important first.
   */
  getMessages(minSeverity: Severity = 'info'): Array<Message & { severity: Severity }> {
    return severitiesFrom(minSeverity).flatMap((severity) =>
      this.messages[severity].map((message) => ({ ...message, severity }))
    );
  }

  countMessages(severity: Severity): number {
    return this.messages[severity].length;
  }

  /**
   * Cross-attribute pass: one Issue per scalar key with divergent values.
   */
  analyseMetadata(): void {
    for (const conflict of this.metadata.findConflicts()) {
      const listed = conflict.values
        .map((item) => `${formatMetadataValue(item.value)} (${item.sources.join(', ')})`)
        .join(', ');
      this.addIssue(
        METADATA_SOURCE,
        `Multiple values exist for ${conflict.key}: ${listed}.`,
        conflict.values.flatMap((item) => item.paths)
      );
    }
  }

  setScanStats(counts: { numDirs: number; numDirsExcluded: number; numFiles: number }): void {
    this.stats.numDirs = counts.numDirs;
    this.stats.numDirsExcluded = counts.numDirsExcluded;
    this.stats.numFiles = counts.numFiles;
  }

  /**
   * Close the run: end time and duration.
   */
  finalize(endDate: Date = new Date()): void {
    this.stats.endDate = endDate;
    this.stats.duration = (endDate.getTime() - this.stats.date.getTime()) / 1000;
  }

  /**
   * Structured form for serialization.
   *
   * @param minSeverity - Lowest severity to include
   * @param plain - Collapse metadata to representative values and omit raw results
   */
  asDict(minSeverity: Severity = 'info', plain: boolean = false): ReportDict {
    const messages: ReportDict['messages'] = {};
    for (const severity of severitiesFrom(minSeverity)) {
      messages[severity] = this.messages[severity].map((message) => ({
        text: message.text,
        source: message.source,
        paths: [...message.paths],
      }));
    }

    const dict: ReportDict = {
      stats: this.statsDict(),
      messages,
      metadata: plain ? this.metadata.toPlain() : this.metadata.toRecords(),
    };

    if (!plain) {
      dict.results = {};
      for (const [id, results] of this.results) {
        dict.results[id] = Object.fromEntries(results);
      }
    }

    return dict;
  }

  private statsDict(): StatsDict {
    return {
      path: this.stats.path,
      date: this.stats.date.toISOString(),
      end_date: this.stats.endDate ? this.stats.endDate.toISOString() : null,
      duration: this.stats.duration ?? null,
      version: this.stats.version,
      num_dirs: this.stats.numDirs,
      num_dirs_excluded: this.stats.numDirsExcluded,
      num_files: this.stats.numFiles,
    };
  }
}


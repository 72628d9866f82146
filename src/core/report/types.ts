/**
 * Report type definitions.
 */
import type {
  AddMetadataOptions,
  MetadataEntry,
  MetadataInput,
  MetadataReader,
  MetadataValue,
} from '../metadata/types.js';
import type { Severity } from './severity.js';

export interface Message {
  text: string;
  /** Id of the analyser or aggregator that raised it */
  source: string;
  /** Files the message is about, relative to the repository root */
  paths: string[];
  /** Remediation advice, attached on output */
  suggestion?: string;
}

/**
 * Raw per-file results of one analyser, keyed by relative path.
 * `null` marks a file that was found but produced no result.
 */
export type FileResults<R = unknown> = Map<string, R | null>;

export interface ReportStats {
  /** Effective repository root after wrapper collapsing */
  path: string;
  /** Start of the run */
  date: Date;
  endDate?: Date;
  /** Seconds */
  duration?: number;
  version: string;
  numDirs: number;
  numDirsExcluded: number;
  numFiles: number;
}

/**
 * Write facade bound to one analyser or aggregator.
 * Plug-ins never touch the Report itself.
 */
export interface ReportWriter {
  /** Absolute repository root */
  readonly root: string;
  /** Id every message and metadata entry is attributed to */
  readonly source: string;
  readonly metadata: MetadataReader;

  addMetadata(key: string, value: MetadataInput, path?: string, options?: AddMetadataOptions): void;
  addMessage(severity: Severity, text: string, paths?: string | readonly string[]): void;
  addIssue(text: string, paths?: string | readonly string[]): void;
  addWarning(text: string, paths?: string | readonly string[]): void;
  addNotice(text: string, paths?: string | readonly string[]): void;
  addSuggestion(text: string, paths?: string | readonly string[]): void;
  addInfo(text: string, paths?: string | readonly string[]): void;
}

export interface StatsDict {
  path: string;
  date: string;
  end_date: string | null;
  duration: number | null;
  version: string;
  num_dirs: number;
  num_dirs_excluded: number;
  num_files: number;
}

/**
 * Structured form for JSON/YAML serialization.
 */
export interface ReportDict {
  stats: StatsDict;
  messages: Partial<Record<Severity, Message[]>>;
  metadata: Record<string, MetadataValue | MetadataValue[]> | Record<string, MetadataEntry[]>;
  results?: Record<string, Record<string, unknown>>;
}

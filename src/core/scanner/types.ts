/**
 * Scanner type definitions.
 */

export interface ScanStats {
  /** Directories visited, the root included */
  dirCount: number;
  /** Directories pruned by an exclude rule */
  dirExcludedCount: number;
  /** Files matched by at least one include rule */
  fileCount: number;
}

export interface ScanOptions {
  /** Checked at every directory and file boundary */
  signal?: AbortSignal;
}

export interface ScanResult {
  /** Matched relative paths per analyser id, in traversal order */
  files: Map<string, string[]>;
  /** Relative paths that were matched as directories */
  directories: Set<string>;
  stats: ScanStats;
}

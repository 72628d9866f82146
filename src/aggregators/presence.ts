/**
 * Shared base for aggregators that report a missing kind of file.
 */
import type { Aggregator, Category, CategoryResults } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import type { Severity } from '../core/report/severity.js';

/**
 * Number of entries found by all analysers of a category.
 */
export function countFiles(results: CategoryResults): number {
  let count = 0;
  for (const files of results.values()) {
    count += files.size;
  }
  return count;
}

export abstract class PresenceAggregator implements Aggregator {
  abstract readonly name: string;
  abstract readonly category: Category;
  /** Severity of the message raised when nothing was found */
  protected abstract readonly severity: Severity;
  protected abstract readonly missingMessage: string;

  aggregate(report: ReportWriter, results: CategoryResults): void {
    if (!this.isPresent(report, results)) {
      report.addMessage(this.severity, this.missingMessage);
    }
  }

  /**
   * Override when presence depends on metadata rather than matched files.
   */
  protected isPresent(_report: ReportWriter, results: CategoryResults): boolean {
    return countFiles(results) > 0;
  }
}

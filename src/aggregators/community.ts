/**
 * Community aggregator: one Warning per missing kind of community file.
 */
import type { Aggregator, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';

export class CommunityAggregator implements Aggregator {
  readonly name = 'Community';
  readonly category: Category = 'community';

  aggregate(report: ReportWriter): void {
    if (!report.metadata.has('conduct_file')) {
      report.addWarning('No code of conduct.');
    }
    if (!report.metadata.has('contributing_file')) {
      report.addWarning('No contributing guidelines.');
    }
  }
}

import type { Category, CategoryResults } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import type { Severity } from '../core/report/severity.js';
import { PresenceAggregator } from './presence.js';

/**
 * A docs/ directory alone does not count as a README.
 */
export class DocumentationAggregator extends PresenceAggregator {
  readonly name = 'Documentation';
  readonly category: Category = 'documentation';
  protected readonly severity: Severity = 'warning';
  protected readonly missingMessage = 'No README file.';

  protected isPresent(report: ReportWriter, _results: CategoryResults): boolean {
    return report.metadata.has('readme_file');
  }
}

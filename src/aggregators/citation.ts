import type { Category } from '../core/registry/types.js';
import type { Severity } from '../core/report/severity.js';
import { PresenceAggregator } from './presence.js';

export class CitationAggregator extends PresenceAggregator {
  readonly name = 'Citation';
  readonly category: Category = 'citation';
  protected readonly severity: Severity = 'warning';
  protected readonly missingMessage = 'No citation file.';
}

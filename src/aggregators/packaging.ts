import type { Category } from '../core/registry/types.js';
import type { Severity } from '../core/report/severity.js';
import { PresenceAggregator } from './presence.js';

export class PackagingAggregator extends PresenceAggregator {
  readonly name = 'Packaging';
  readonly category: Category = 'packaging';
  protected readonly severity: Severity = 'warning';
  protected readonly missingMessage = 'No packaging file.';
}

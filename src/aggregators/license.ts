import type { Category } from '../core/registry/types.js';
import type { Severity } from '../core/report/severity.js';
import { PresenceAggregator } from './presence.js';

export class LicenseAggregator extends PresenceAggregator {
  readonly name = 'License';
  readonly category: Category = 'license';
  protected readonly severity: Severity = 'issue';
  protected readonly missingMessage = 'No license file.';
}

import type { Category } from '../core/registry/types.js';
import type { Severity } from '../core/report/severity.js';
import { PresenceAggregator } from './presence.js';

export class VersionControlAggregator extends PresenceAggregator {
  readonly name = 'Version Control';
  readonly category: Category = 'version_control';
  protected readonly severity: Severity = 'issue';
  protected readonly missingMessage = 'No version control.';
}

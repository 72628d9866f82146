/**
 * Formatter type definitions.
 */
import type { OutputFormat } from '../../core/config/schema.js';
import type { Report } from '../../core/report/report.js';
import type { Severity } from '../../core/report/severity.js';
import type { SuggestionRule } from '../../core/report/suggestions.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Lowest severity to show */
  minSeverity: Severity;
  /** Representative metadata values only, no raw results */
  plain: boolean;
  /** Use colors in output */
  colors: boolean;
  /** Remediation advice attached to matching messages */
  suggestions: readonly SuggestionRule[];
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  format(report: Report): string;
}

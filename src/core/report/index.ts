/**
 * Report barrel file.
 */
export { Report, METADATA_SOURCE, type ReportOptions } from './report.js';
export {
  SEVERITIES,
  SEVERITY_LABELS,
  severitiesFrom,
  type Severity,
} from './severity.js';
export { loadSuggestions, findSuggestion, getSuggestionsPath, type SuggestionRule } from './suggestions.js';
export type * from './types.js';

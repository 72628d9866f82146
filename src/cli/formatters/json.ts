import type { Report } from '../../core/report/report.js';
import type { ReportDict } from '../../core/report/types.js';
import { findSuggestion } from '../../core/report/suggestions.js';
import type { FormatOptions, IFormatter } from './types.js';

/**
 * Report dictionary with the suggestion of each message, where one exists.
 */
export function toOutputDict(report: Report, options: FormatOptions): ReportDict {
  const dict = report.asDict(options.minSeverity, options.plain);
  for (const messages of Object.values(dict.messages)) {
    for (const message of messages ?? []) {
      const suggestion = findSuggestion(message.text, options.suggestions);
      if (suggestion) {
        message.suggestion = suggestion;
      }
    }
  }
  return dict;
}

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  constructor(private readonly options: FormatOptions) {}

  format(report: Report): string {
    return JSON.stringify(toOutputDict(report, this.options), null, 2);
  }
}

/**
 * Message severities, in increasing importance.
 */

export const SEVERITIES = ['info', 'suggestion', 'notice', 'warning', 'issue'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_LABELS: Record<Severity, string> = {
  info: 'Info',
  suggestion: 'Suggestion',
  notice: 'Notice',
  warning: 'Warning',
  issue: 'Issue',
};

function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Severities at or above a threshold, most important first.
 */
export function severitiesFrom(minSeverity: Severity): Severity[] {
  return SEVERITIES.filter((severity) => severityRank(severity) >= severityRank(minSeverity)).reverse();
}

import chalk from 'chalk';
import type { MetadataValue } from '../../core/metadata/types.js';
import type { Report } from '../../core/report/report.js';
import { SEVERITY_LABELS, severitiesFrom, type Severity } from '../../core/report/severity.js';
import { findSuggestion } from '../../core/report/suggestions.js';
import type { Message } from '../../core/report/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

const SEVERITY_COLORS: Record<Severity, Color> = {
  issue: 'red',
  warning: 'yellow',
  notice: 'green',
  suggestion: 'cyan',
  info: 'dim',
};

const SECTION_TITLES: Record<Severity, string> = {
  issue: 'ISSUES',
  warning: 'WARNINGS',
  notice: 'NOTICES',
  suggestion: 'SUGGESTIONS',
  info: 'INFO',
};

const SEVERITY_ICONS: Record<Severity, string> = {
  issue: '✗',
  warning: '⚠',
  notice: '✓',
  suggestion: '→',
  info: '·',
};

/**
 * Display form of a metadata value: records become `field: value` lists.
 */
export function displayValue(value: MetadataValue): string {
  if (typeof value === 'object') {
    return Object.entries(value)
      .map(([field, item]) => `${field}: ${String(item)}`)
      .join(', ');
  }
  return String(value);
}

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  constructor(private readonly options: FormatOptions) {}

  format(report: Report): string {
    const lines: string[] = [];
    const { stats } = report;

    lines.push(this.colorize(`Repository: ${stats.path}`, 'blue'));
    lines.push(
      this.colorize(
        `Matched ${stats.numFiles} file(s) in ${stats.numDirs} director${stats.numDirs === 1 ? 'y' : 'ies'}` +
          ` (${stats.numDirsExcluded} excluded) in ${(stats.duration ?? 0).toFixed(2)}s`,
        'dim'
      )
    );

    for (const severity of severitiesFrom(this.options.minSeverity)) {
      const messages = report.messages[severity];
      if (messages.length === 0) {
        continue;
      }
      lines.push('');
      lines.push(
        this.colorize(`${SECTION_TITLES[severity]} (${messages.length}):`, SEVERITY_COLORS[severity])
      );
      for (const message of messages) {
        lines.push(...this.formatMessage(severity, message));
      }
    }

    const metadata = this.formatMetadata(report);
    if (metadata.length > 0) {
      lines.push('');
      lines.push(this.colorize('METADATA:', 'blue'));
      lines.push(...metadata);
    }

    lines.push('');
    lines.push(this.formatSummary(report));

    return lines.join('\n');
  }

  private formatMessage(severity: Severity, message: Message): string[] {
    const lines: string[] = [];
    const icon = this.colorize(SEVERITY_ICONS[severity], SEVERITY_COLORS[severity]);
    lines.push(`  ${icon} ${message.text} ${this.colorize(`[${message.source}]`, 'dim')}`);

    for (const filePath of message.paths) {
      lines.push(`      ${filePath}`);
    }

    const suggestion = findSuggestion(message.text, this.options.suggestions);
    if (suggestion) {
      lines.push(`      ${this.colorize(`Suggestion: ${suggestion}`, 'cyan')}`);
    }
    return lines;
  }

  private formatMetadata(report: Report): string[] {
    const lines: string[] = [];
    for (const key of report.metadata.keys()) {
      const value = report.metadata.value(key);
      if (value === undefined) {
        continue;
      }
      if (Array.isArray(value)) {
        lines.push(`  ${key}:`);
        for (const item of value) {
          lines.push(`    - ${displayValue(item)}`);
        }
      } else {
        const sources = this.options.plain ? '' : ` ${this.colorize(`(${report.metadata.sources(key).join(', ')})`, 'dim')}`;
        lines.push(`  ${key}: ${displayValue(value)}${sources}`);
      }
    }
    return lines;
  }

  private formatSummary(report: Report): string {
    const counts = (['issue', 'warning', 'notice'] as const).map((severity) => {
      const count = report.countMessages(severity);
      const label = `${count} ${SEVERITY_LABELS[severity].toLowerCase()}${count === 1 ? '' : 's'}`;
      return count > 0 ? this.colorize(label, SEVERITY_COLORS[severity]) : label;
    });
    return `Summary: ${counts.join(', ')}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

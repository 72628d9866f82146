import type { Report } from '../../core/report/report.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { toOutputDict } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

/**
 * YAML output formatter.
 */
export class YamlFormatter implements IFormatter {
  constructor(private readonly options: FormatOptions) {}

  format(report: Report): string {
    return stringifyYaml(toOutputDict(report, this.options));
  }
}

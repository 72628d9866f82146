/**
 * Output formatters.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { YamlFormatter } from './yaml.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export { HumanFormatter, JsonFormatter, YamlFormatter };
export { toOutputDict } from './json.js';
export { displayValue } from './human.js';
export type { FormatOptions, IFormatter, OutputFormat };

export function createFormatter(format: OutputFormat, options: FormatOptions): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(options);
    case 'yaml':
      return new YamlFormatter(options);
    case 'human':
      return new HumanFormatter(options);
  }
}

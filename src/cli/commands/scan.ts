import { Command } from 'commander';
import { z } from 'zod';
import { analyse } from '../../core/analysis/engine.js';
import { resolveRoot } from '../../core/analysis/root.js';
import { loadConfig, mergeConfig } from '../../core/config/loader.js';
import { OutputFormatSchema, SeveritySchema, type Config } from '../../core/config/schema.js';
import { loadSuggestions } from '../../core/report/suggestions.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface ScanCommandOptions {
  skip?: string[];
  skipType?: string[];
  exclude?: string[];
  format?: string;
  minSeverity?: string;
  plain?: boolean;
  config?: string;
  debug?: boolean;
  color: boolean;
}

const FlagsSchema = z.object({
  format: OutputFormatSchema.optional(),
  minSeverity: SeveritySchema.optional(),
});

/**
 * Command line values that override the config file.
 */
export function toOverrides(options: ScanCommandOptions): Partial<Config> {
  const flags = FlagsSchema.safeParse({ format: options.format, minSeverity: options.minSeverity });
  if (!flags.success) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Invalid option: ${formatZodError(flags.error)}`);
  }
  return {
    skip: options.skip,
    skip_types: options.skipType,
    exclude: options.exclude,
    format: flags.data.format,
    min_severity: flags.data.minSeverity,
    plain: options.plain ? true : undefined,
  };
}

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Scan a repository and report on its metadata and good practices')
    .argument('[path]', 'Repository directory', '.')
    .option('--skip <ids...>', 'Analyser or aggregator ids to skip')
    .option('--skip-type <types...>', 'Categories to skip (e.g. code, version_control)')
    .option('--exclude <dirs...>', 'Extra directories to prune, each ending with "/"')
    .option('--format <format>', 'Output format: human, json, or yaml')
    .option('--min-severity <level>', 'Lowest severity to report: info, suggestion, notice, warning, issue')
    .option('--plain', 'Representative metadata values only, without raw results')
    .option('--config <path>', 'Path to config file (default: <path>/.repoaudit.yaml)')
    .option('--debug', 'Show debug logging')
    .option('--no-color', 'Disable colored output')
    .action(async (repoPath: string, options: ScanCommandOptions) => {
      try {
        await runScan(repoPath, options);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

async function runScan(repoPath: string, options: ScanCommandOptions): Promise<void> {
  if (options.debug) {
    log.setLevel('debug');
  }

  const root = await resolveRoot(repoPath);
  const config = mergeConfig(await loadConfig(root, options.config), toOverrides(options));

  const report = await analyse(root, {
    skip: config.skip,
    skipTypes: config.skip_types,
    exclude: config.exclude,
  });

  const formatter = createFormatter(config.format, {
    minSeverity: config.min_severity,
    plain: config.plain,
    colors: options.color,
    suggestions: await loadSuggestions(),
  });

  console.log(formatter.format(report));
}

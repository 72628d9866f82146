/**
 * Command line interface.
 */
import { Command } from 'commander';
import '../analysers/register.js';
import '../aggregators/register.js';
import { VERSION } from '../version.js';
import { createListCommand } from './commands/list.js';
import { createScanCommand } from './commands/scan.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('repoaudit')
    .description('Scan a code repository for metadata and good practices')
    .version(VERSION);
  [createScanCommand, createListCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}

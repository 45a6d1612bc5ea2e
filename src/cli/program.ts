/**
 * docveil program
 *
 * Builds the commander program; `cli.ts` is the executable entry.
 *
 * @module cli/program
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@docveil/engine';
import { describeConfig, getConfig, ENV_VARS } from '../runtime/config.js';
import {
  createAnonymizeCommand,
  createExtractCommand,
  createRestoreCommand,
  createSegmentCommand,
  createSplitCommand,
  createVaultCommand,
} from './commands/index.js';
import { formatJson } from './formatters.js';
import { GlobalOptionsSchema, getCliConfig, parseOptions, setCliConfig } from './options.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('docveil')
    .description(chalk.bold('docveil') + '\n\nExtract, anonymize, restore and chunk documents.')
    .version(VERSION, '-v, --version', 'Display version information')
    .option('-f, --format <format>', 'Output format (table, json)', 'table')
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Enable debug logging and stack traces')
    .option('-q, --quiet', 'Suppress all output except errors')
    .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)')
    .hook('preAction', (thisCommand) => {
      const options = parseOptions(GlobalOptionsSchema, thisCommand.opts());
      const cli = setCliConfig(options);

      if (cli.noColor) {
        chalk.level = 0;
      }

      const fallback = cli.verbose ? 'debug' : cli.quiet ? 'error' : getConfig().logLevel;
      setLogLevel(options.logLevel ?? fallback);
    });

  program.addCommand(createAnonymizeCommand());
  program.addCommand(createRestoreCommand());
  program.addCommand(createExtractCommand());
  program.addCommand(createSegmentCommand());
  program.addCommand(createSplitCommand());
  program.addCommand(createVaultCommand());

  program
    .command('version')
    .description('Display version and configuration')
    .action(() => {
      const configuration = describeConfig(getConfig());

      if (getCliConfig().outputFormat === 'json') {
        console.log(formatJson({ name: 'docveil', version: VERSION, node: process.version, configuration }));
        return;
      }

      console.log(`${chalk.bold('docveil')} ${VERSION}`);
      console.log();
      console.log(chalk.dim('Build info:'));
      console.log(`  Platform: ${process.platform}`);
      console.log(`  Arch: ${process.arch}`);
      console.log(`  Node: ${process.version}`);
      console.log();
      console.log(chalk.dim('Configuration:'));
      for (const [key, value] of Object.entries(configuration)) {
        console.log(`  ${key}: ${value}`);
      }
      console.log();
      console.log(chalk.dim(`Set ${Object.values(ENV_VARS).join(', ')} to configure.`));
    });

  return program;
}

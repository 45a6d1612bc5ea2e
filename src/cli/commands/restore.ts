/**
 * Restore Command
 *
 * @module cli/commands/restore
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { restoreDocuments } from '@docveil/engine';
import { collectValues, parseOptions } from '../options.js';
import { handleError, runTool } from '../run-tool.js';
import { resolveSelection } from './selection.js';

const RestoreOptionsSchema = z.object({
  output: z.string().min(1),
  vault: z.string().min(1).optional(),
  pattern: z.array(z.string().min(1)).optional(),
  recursive: z.boolean().default(true),
});

export function createRestoreCommand(): Command {
  return new Command('restore')
    .description('Restore anonymized documents from their vault')
    .argument('<paths...>', 'Anonymized files, or one directory to scan')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('--vault <path>', 'Vault file (default: vault.json beside or inside the scanned directory)')
    .option('-p, --pattern <glob>', 'File pattern for directory scans (repeatable)', collectValues)
    .option('--no-recursive', 'Do not descend into subdirectories')
    .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Restore a batch; ./out/vault.json is found automatically')}
  $ docveil restore ./out/anonymized -o ./restored

  ${chalk.dim('# Restore an edited copy with an explicit vault')}
  $ docveil restore reviewed.md -o ./restored --vault ./out/vault.json
`)
    .action(async (paths: string[], rawOptions: unknown) => {
      try {
        const options = parseOptions(RestoreOptionsSchema, rawOptions);
        const selection = await resolveSelection(paths);

        await runTool('Restoring documents', context => restoreDocuments({
          ...selection,
          recursive: options.recursive,
          outputDir: options.output,
          vaultPath: options.vault,
          ...(options.pattern ? { patterns: options.pattern } : {}),
        }, context));
      } catch (error) {
        handleError(error);
      }
    });
}

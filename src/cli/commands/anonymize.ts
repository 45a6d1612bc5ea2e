/**
 * Anonymize Command
 *
 * Replaces detected sensitive values in a batch of documents with consistent
 * synthetic values and writes the vault needed to restore them.
 *
 * @module cli/commands/anonymize
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { anonymizeDocuments } from '@docveil/engine';
import { collectValues, parseEntityTypes, parseOptions } from '../options.js';
import { handleError, runTool } from '../run-tool.js';
import { resolveSelection } from './selection.js';

const AnonymizeOptionsSchema = z.object({
  output: z.string().min(1),
  pattern: z.array(z.string().min(1)).optional(),
  recursive: z.boolean().default(true),
  entities: z.string().optional(),
  threshold: z.coerce.number().optional(),
  dateShift: z.coerce.number().int().optional(),
  seedVault: z.string().min(1).optional(),
});

export function createAnonymizeCommand(): Command {
  return new Command('anonymize')
    .description('Anonymize documents and write a restoration vault')
    .argument('<paths...>', 'Files, or one directory to scan')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('-p, --pattern <glob>', 'File pattern for directory scans (repeatable)', collectValues)
    .option('--no-recursive', 'Do not descend into subdirectories')
    .option('-e, --entities <types>', 'Entity types to replace (comma-separated, e.g. PERSON,EMAIL_ADDRESS)')
    .option('-t, --threshold <score>', 'Minimum detection confidence (0.0-1.0)')
    .option('--date-shift <days>', 'Upper bound of the date offset in days')
    .option('--seed-vault <path>', 'Continue from the mappings of an existing vault')
    .addHelpText('after', `
${chalk.bold('Output:')}
  <dir>/anonymized/*.md   anonymized documents
  <dir>/vault.json        mappings needed to restore them
  <dir>/REPORT.md         run summary

${chalk.bold('Examples:')}
  ${chalk.dim('# Anonymize every markdown, text and PDF file under ./contracts')}
  $ docveil anonymize ./contracts -o ./out

  ${chalk.dim('# Only people and email addresses, with a stricter threshold')}
  $ docveil anonymize notes.md letter.txt -o ./out -e PERSON,EMAIL_ADDRESS -t 0.7

  ${chalk.dim('# Add documents to an earlier batch, keeping its replacements')}
  $ docveil anonymize ./more -o ./out2 --seed-vault ./out/vault.json
`)
    .action(async (paths: string[], rawOptions: unknown) => {
      try {
        const options = parseOptions(AnonymizeOptionsSchema, rawOptions);
        const selection = await resolveSelection(paths);
        const entityTypes = options.entities ? parseEntityTypes(options.entities) : undefined;

        await runTool('Anonymizing documents', (context, config) => anonymizeDocuments({
          ...selection,
          recursive: options.recursive,
          outputDir: options.output,
          ...(options.pattern ? { patterns: options.pattern } : {}),
          entityTypes,
          scoreThreshold: options.threshold ?? config.scoreThreshold,
          dateShiftDays: options.dateShift ?? config.dateShiftDays,
          seedVault: options.seedVault,
        }, context));
      } catch (error) {
        handleError(error);
      }
    });
}

/**
 * Split Command
 *
 * Writes one prompt file per heading at the chosen level.
 *
 * @module cli/commands/split
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { ConfigurationError, HeadingLevelSchema, splitIntoPrompts } from '@docveil/engine';
import { parseOptions } from '../options.js';
import { handleError, runTool } from '../run-tool.js';

const SplitOptionsSchema = z.object({
  output: z.string().min(1),
  level: HeadingLevelSchema.default('h2'),
  parentContext: z.boolean().default(true),
  template: z.string().optional(),
  templateFile: z.string().min(1).optional(),
});

export function createSplitCommand(): Command {
  return new Command('split')
    .description('Split a markdown document into one prompt per section')
    .argument('<file>', 'Markdown or text document')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('-l, --level <level>', 'Heading level to split at (h1-h6)', 'h2')
    .option('--no-parent-context', 'Do not prepend the parent heading')
    .option('--template <text>', 'Prompt template')
    .option('--template-file <path>', 'Read the prompt template from a file')
    .addHelpText('after', `
${chalk.bold('Template placeholders:')}
  {heading}  section heading text
  {content}  section body
  {parent}   parent heading, or empty
  {level}    heading depth (1-6)
`)
    .action(async (file: string, rawOptions: unknown) => {
      try {
        const options = parseOptions(SplitOptionsSchema, rawOptions);
        if (options.template !== undefined && options.templateFile) {
          throw new ConfigurationError('Use either --template or --template-file, not both');
        }
        const promptTemplate = options.templateFile
          ? await readFile(options.templateFile, 'utf-8')
          : options.template;

        await runTool('Splitting into prompts', context => splitIntoPrompts({
          filePath: file,
          outputDir: options.output,
          splitLevel: options.level,
          includeParentContext: options.parentContext,
          promptTemplate,
        }, context));
      } catch (error) {
        handleError(error);
      }
    });
}

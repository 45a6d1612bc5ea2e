/**
 * Extract Command
 *
 * @module cli/commands/extract
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { ExtractionMethodSchema, extractDocument } from '@docveil/engine';
import { parseOptions } from '../options.js';
import { handleError, runTool } from '../run-tool.js';

const ExtractOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  method: ExtractionMethodSchema.default('auto'),
});

export function createExtractCommand(): Command {
  return new Command('extract')
    .description('Convert a document to markdown')
    .argument('<file>', 'Document to convert')
    .option('-o, --output <file>', 'Markdown output path (default: beside the input, with a .md extension)')
    .option('-m, --method <method>', 'Connector (auto, azure, llamaindex, docling, text)', 'auto')
    .addHelpText('after', `
${chalk.bold('Connectors:')}
  ${chalk.cyan('azure')}      - Azure Document Intelligence (AZURE_DI_ENDPOINT, AZURE_DI_KEY)
  ${chalk.cyan('llamaindex')} - LlamaParse (LLAMAPARSE_API_KEY)
  ${chalk.cyan('docling')}    - docling-serve (DOCLING_URL)
  ${chalk.cyan('text')}       - markdown and text passthrough

  ${chalk.dim('auto picks the first configured connector, in the order above, that accepts the file.')}
`)
    .action(async (file: string, rawOptions: unknown) => {
      try {
        const options = parseOptions(ExtractOptionsSchema, rawOptions);

        await runTool('Extracting document', context => extractDocument({
          filePath: file,
          outputPath: options.output,
          method: options.method,
        }, context));
      } catch (error) {
        handleError(error);
      }
    });
}

/**
 * Segment Command
 *
 * @module cli/commands/segment
 */

import { Command } from 'commander';
import { z } from 'zod';
import { segmentDocument } from '@docveil/engine';
import { parseHeadingLevels, parseOptions } from '../options.js';
import { handleError, runTool } from '../run-tool.js';

const SegmentOptionsSchema = z.object({
  output: z.string().min(1),
  maxTokens: z.coerce.number().int().positive().optional(),
  minTokens: z.coerce.number().int().positive().optional(),
  breakAt: z.string().optional(),
});

export function createSegmentCommand(): Command {
  return new Command('segment')
    .description('Split a large markdown document into token-bounded segments')
    .argument('<file>', 'Markdown or text document')
    .requiredOption('-o, --output <dir>', 'Output directory')
    .option('--max-tokens <n>', 'Hard upper bound per segment (default 15000)')
    .option('--min-tokens <n>', 'Size after which a heading closes a segment (default 10000)')
    .option('--break-at <levels>', 'Heading levels to break at (comma-separated, default h1,h2)')
    .action(async (file: string, rawOptions: unknown) => {
      try {
        const options = parseOptions(SegmentOptionsSchema, rawOptions);

        await runTool('Segmenting document', context => segmentDocument({
          filePath: file,
          outputDir: options.output,
          maxTokens: options.maxTokens,
          minTokens: options.minTokens,
          breakAtHeadings: options.breakAt ? parseHeadingLevels(options.breakAt) : undefined,
        }, context));
      } catch (error) {
        handleError(error);
      }
    });
}

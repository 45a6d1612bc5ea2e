/**
 * docveil: Split Into Prompts Tool
 *
 * @module tools/split-into-prompts
 */

import * as path from 'node:path';
import {
  SplitIntoPromptsInputSchema,
  type ProcessingResult,
  type SplitIntoPromptsInput,
} from '../contracts/index.js';
import { SegmentationError } from '../errors/index.js';
import { TEXT_FORMATS } from '../extraction/index.js';
import { splitMarkdownIntoPrompts } from '../segmentation/index.js';
import { resolveToolContext, type ToolContext } from './context.js';
import { readTextInput, writeOutput } from './files.js';
import { renderPromptHeader, renderPromptReport, safeHeading } from './reports.js';
import { failureResult, parseToolInput } from './results.js';

export const PROMPTS_DIR = 'prompts';
export const PROMPT_REPORT = 'PROMPT_REPORT.md';

export function promptFileName(baseName: string, promptNumber: number, heading: string): string {
  return `${baseName}_${String(promptNumber).padStart(3, '0')}_${safeHeading(heading)}.md`;
}

export async function splitIntoPrompts(
  input: SplitIntoPromptsInput,
  context: ToolContext = {}
): Promise<ProcessingResult> {
  const ctx = resolveToolContext(context);

  try {
    const params = parseToolInput(SplitIntoPromptsInputSchema, input);
    const inputPath = path.resolve(params.filePath);
    if (!TEXT_FORMATS.includes(path.extname(inputPath).toLowerCase())) {
      throw new SegmentationError('Only markdown or text files can be split into prompts', { filePath: params.filePath });
    }

    ctx.progress('Reading document...', 0.1);
    const content = await readTextInput(inputPath, params.filePath);

    ctx.progress(`Splitting by ${params.splitLevel} headings...`, 0.2);
    const prompts = splitMarkdownIntoPrompts(content, {
      splitLevel: params.splitLevel,
      includeParentContext: params.includeParentContext,
      promptTemplate: params.promptTemplate,
    });
    if (prompts.length === 0) {
      return {
        success: false,
        outputPaths: [],
        statistics: {},
        message: `No ${params.splitLevel} headings found in document`,
      };
    }

    const outputDir = path.resolve(params.outputDir);
    const sourceName = path.basename(inputPath);
    const baseName = path.parse(inputPath).name;
    const outputPaths: string[] = [];

    for (const [index, prompt] of prompts.entries()) {
      ctx.progress(`Writing prompt ${prompt.promptNumber} of ${prompt.totalPrompts}...`, 0.3 + (0.6 * index) / prompts.length);
      const target = path.join(outputDir, PROMPTS_DIR, promptFileName(baseName, prompt.promptNumber, prompt.heading));
      await writeOutput(target, `${renderPromptHeader(prompt, sourceName)}\n${prompt.content}\n`);
      outputPaths.push(target);
    }

    ctx.progress('Creating prompt report...', 0.95);
    await writeOutput(path.join(outputDir, PROMPT_REPORT), renderPromptReport({
      generatedAt: ctx.now(),
      sourceName,
      outputDir,
      splitLevel: params.splitLevel,
      includeParentContext: params.includeParentContext,
      templateUsed: Boolean(params.promptTemplate),
      prompts,
    }));
    ctx.progress('Prompt generation complete!', 1);

    return {
      success: true,
      outputPaths,
      statistics: {
        total_prompts: prompts.length,
        split_level: params.splitLevel,
        average_length: Math.floor(prompts.reduce((sum, prompt) => sum + prompt.content.length, 0) / prompts.length),
        parent_context: params.includeParentContext,
        template_used: Boolean(params.promptTemplate),
      },
      message: `Successfully created ${prompts.length} prompt files`,
    };
  } catch (error) {
    return failureResult('Prompt splitting', error);
  }
}

/**
 * docveil: Extract Document Tool
 *
 * @module tools/extract-document
 */

import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import {
  ExtractDocumentInputSchema,
  type ExtractDocumentInput,
  type ProcessingResult,
} from '../contracts/index.js';
import { ConfigurationError, InputNotFoundError } from '../errors/index.js';
import { resolveToolContext, type ToolContext } from './context.js';
import { writeOutput } from './files.js';
import { failureResult, parseToolInput, scaleProgress } from './results.js';

export async function extractDocument(
  input: ExtractDocumentInput,
  context: ToolContext = {}
): Promise<ProcessingResult> {
  const ctx = resolveToolContext(context);

  try {
    const params = parseToolInput(ExtractDocumentInputSchema, input);
    const inputPath = path.resolve(params.filePath);
    const exists = await stat(inputPath).then(info => info.isFile(), () => false);
    if (!exists) {
      throw new InputNotFoundError(params.filePath);
    }

    const parsed = path.parse(inputPath);
    const outputPath = params.outputPath
      ? path.resolve(params.outputPath)
      : path.join(parsed.dir, `${parsed.name}.md`);
    if (outputPath === inputPath) {
      throw new ConfigurationError(`Output path would overwrite the input: ${outputPath}`);
    }

    ctx.progress(`Extracting ${parsed.base}...`, 0.2);
    const extractor = await ctx.extractors.select(inputPath, params.method);

    ctx.progress(`Using ${extractor.name}...`, 0.3);
    const report = scaleProgress(ctx.progress, 0.3, 0.9);
    const result = await extractor.extract(inputPath, progress => report(progress.message, progress.percent));

    ctx.progress('Writing markdown output...', 0.9);
    await writeOutput(outputPath, result.markdown);
    ctx.progress('Extraction complete!', 1);

    return {
      success: true,
      outputPaths: [outputPath],
      statistics: {
        extraction_method: result.method,
        extractor_name: extractor.name,
        pages: result.pageCount,
        processing_time_ms: Math.round(result.processingTimeMs),
        output_characters: result.markdown.length,
        ...result.metadata,
      },
      message: `Successfully extracted ${parsed.base} to markdown`,
    };
  } catch (error) {
    return failureResult('Extraction', error);
  }
}

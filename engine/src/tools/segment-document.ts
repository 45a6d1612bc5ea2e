/**
 * docveil: Segment Document Tool
 *
 * @module tools/segment-document
 */

import * as path from 'node:path';
import {
  SegmentDocumentInputSchema,
  type ProcessingResult,
  type SegmentDocumentInput,
} from '../contracts/index.js';
import { SegmentationError } from '../errors/index.js';
import { TEXT_FORMATS } from '../extraction/index.js';
import { segmentLargeDocument } from '../segmentation/index.js';
import { resolveToolContext, type ToolContext } from './context.js';
import { readTextInput, writeOutput } from './files.js';
import { renderSegmentHeader, renderSegmentationReport } from './reports.js';
import { failureResult, parseToolInput } from './results.js';

export const SEGMENTS_DIR = 'segments';
export const SEGMENTATION_REPORT = 'SEGMENTATION_REPORT.md';

export function segmentFileName(baseName: string, segmentNumber: number, totalSegments: number): string {
  const pad = (n: number): string => String(n).padStart(3, '0');
  return `${baseName}_${pad(segmentNumber)}_of_${pad(totalSegments)}.md`;
}

export async function segmentDocument(
  input: SegmentDocumentInput,
  context: ToolContext = {}
): Promise<ProcessingResult> {
  const ctx = resolveToolContext(context);

  try {
    const params = parseToolInput(SegmentDocumentInputSchema, input);
    const inputPath = path.resolve(params.filePath);
    if (!TEXT_FORMATS.includes(path.extname(inputPath).toLowerCase())) {
      throw new SegmentationError('Only markdown or text files can be segmented', { filePath: params.filePath });
    }

    ctx.progress('Reading document...', 0.1);
    const content = await readTextInput(inputPath, params.filePath);

    ctx.progress('Analyzing document structure...', 0.2);
    const segments = segmentLargeDocument(content, {
      minTokens: params.minTokens,
      maxTokens: params.maxTokens,
      breakAtHeadings: params.breakAtHeadings,
    });
    if (segments.length === 0) {
      throw new SegmentationError(`Document is empty: ${params.filePath}`);
    }

    const outputDir = path.resolve(params.outputDir);
    const sourceName = path.basename(inputPath);
    const baseName = path.parse(inputPath).name;
    const outputPaths: string[] = [];

    for (const [index, segment] of segments.entries()) {
      ctx.progress(
        `Writing segment ${segment.segmentNumber} of ${segment.totalSegments}...`,
        0.3 + (0.6 * index) / segments.length
      );
      const target = path.join(outputDir, SEGMENTS_DIR, segmentFileName(baseName, segment.segmentNumber, segment.totalSegments));
      await writeOutput(target, `${renderSegmentHeader(segment, sourceName)}\n${segment.content}\n`);
      outputPaths.push(target);
    }

    ctx.progress('Creating segmentation report...', 0.95);
    await writeOutput(path.join(outputDir, SEGMENTATION_REPORT), renderSegmentationReport({
      generatedAt: ctx.now(),
      sourceName,
      outputDir,
      minTokens: params.minTokens,
      maxTokens: params.maxTokens,
      breakAtHeadings: params.breakAtHeadings,
      segments,
    }));
    ctx.progress('Segmentation complete!', 1);

    const tokenCounts = segments.map(segment => segment.tokenCount);
    return {
      success: true,
      outputPaths,
      statistics: {
        total_segments: segments.length,
        average_tokens: Math.floor(tokenCounts.reduce((sum, n) => sum + n, 0) / segments.length),
        min_tokens: Math.min(...tokenCounts),
        max_tokens: Math.max(...tokenCounts),
      },
      message: `Successfully segmented into ${segments.length} files`,
    };
  } catch (error) {
    return failureResult('Segmentation', error);
  }
}

/**
 * docveil: Tool Contracts
 *
 * Input schemas and the common result envelope of the document tools.
 *
 * @module contracts/tools
 */

import { z } from 'zod';
import { EntityTypeSchema } from './entity-types.js';
import { DEFAULT_DATE_SHIFT_DAYS, DEFAULT_SCORE_THRESHOLD } from './pipeline-config.js';

export const HeadingLevelSchema = z.enum(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

export type HeadingLevel = z.infer<typeof HeadingLevelSchema>;

export const ExtractionMethodSchema = z.enum(['auto', 'azure', 'llamaindex', 'docling', 'text']);

export type ExtractionMethod = z.infer<typeof ExtractionMethodSchema>;

const FileSelectionSchema = z.object({
  files: z.array(z.string().min(1)).optional(),
  directory: z.string().min(1).optional(),
  recursive: z.boolean().default(true),
});

export const AnonymizeDocumentsInputSchema = FileSelectionSchema.extend({
  outputDir: z.string().min(1),
  patterns: z.array(z.string().min(1)).default(['*.pdf', '*.md', '*.txt']),
  entityTypes: z.array(EntityTypeSchema).optional(),
  scoreThreshold: z.number().min(0).max(1).default(DEFAULT_SCORE_THRESHOLD),
  dateShiftDays: z.number().int().min(0).default(DEFAULT_DATE_SHIFT_DAYS),
  /** Existing vault whose mappings seed this batch */
  seedVault: z.string().min(1).optional(),
});

export type AnonymizeDocumentsInput = z.input<typeof AnonymizeDocumentsInputSchema>;

export const RestoreDocumentsInputSchema = FileSelectionSchema.extend({
  outputDir: z.string().min(1),
  vaultPath: z.string().min(1).optional(),
  patterns: z.array(z.string().min(1)).default(['*.md']),
});

export type RestoreDocumentsInput = z.input<typeof RestoreDocumentsInputSchema>;

export const ExtractDocumentInputSchema = z.object({
  filePath: z.string().min(1),
  outputPath: z.string().min(1).optional(),
  method: ExtractionMethodSchema.default('auto'),
});

export type ExtractDocumentInput = z.input<typeof ExtractDocumentInputSchema>;

export const SegmentDocumentInputSchema = z.object({
  filePath: z.string().min(1),
  outputDir: z.string().min(1),
  maxTokens: z.number().int().positive().default(15000),
  minTokens: z.number().int().positive().default(10000),
  breakAtHeadings: z.array(HeadingLevelSchema).default(['h1', 'h2']),
}).refine(input => input.minTokens <= input.maxTokens, {
  message: 'minTokens must not exceed maxTokens',
  path: ['minTokens'],
});

export type SegmentDocumentInput = z.input<typeof SegmentDocumentInputSchema>;

export const SplitIntoPromptsInputSchema = z.object({
  filePath: z.string().min(1),
  outputDir: z.string().min(1),
  splitLevel: HeadingLevelSchema.default('h2'),
  includeParentContext: z.boolean().default(true),
  promptTemplate: z.string().optional(),
});

export type SplitIntoPromptsInput = z.input<typeof SplitIntoPromptsInputSchema>;

/**
 * Result envelope returned by every tool
 */
export interface ProcessingResult {
  success: boolean;
  outputPaths: string[];
  statistics: Record<string, unknown>;
  message: string;
  vaultPath?: string;
  /** Files that could not be processed, with the reason */
  failures?: Array<{ file: string; code: string; message: string }>;
  error?: {
    code: string;
    message: string;
  };
}

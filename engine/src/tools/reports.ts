/**
 * docveil: Reports
 *
 * Markdown reports written next to tool output, and the comment headers
 * prepended to segment and prompt files.
 *
 * @module tools/reports
 */

import {
  ENTITY_TYPES,
  type EntityCounts,
  type FileOutcome,
  type HeadingLevel,
} from '../contracts/index.js';
import type { DocumentSegment, PromptSection } from '../segmentation/index.js';

const HEADING_LEVELS: readonly HeadingLevel[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export interface AnonymizationReportInput {
  generatedAt: Date;
  outputDir: string;
  vaultFile: string;
  files: readonly FileOutcome[];
  statistics: EntityCounts;
  newMappings: number;
  totalMappings: number;
  seedVault?: string;
}

export function renderAnonymizationReport(input: AnonymizationReportInput): string {
  const anonymized = input.files.filter(file => file.status === 'anonymized').length;
  const lines = [
    '# Anonymization Report',
    '',
    `Generated: ${input.generatedAt.toISOString()}`,
    '',
    '## Summary',
    `- Files processed: ${anonymized} of ${input.files.length}`,
    `- Output directory: ${input.outputDir}`,
    `- Vault location: ${input.vaultFile}`,
    `- New mappings: ${input.newMappings}`,
    `- Total mappings: ${input.totalMappings}`,
  ];
  if (input.seedVault) {
    lines.push(`- Resumed from: ${input.seedVault}`);
  }

  lines.push('', '## Statistics');
  const counted = ENTITY_TYPES.filter(type => (input.statistics[type] ?? 0) > 0);
  if (counted.length === 0) {
    lines.push('- No entities replaced');
  }
  for (const type of counted) {
    lines.push(`- ${type}: ${input.statistics[type] ?? 0}`);
  }

  const problems = input.files.filter(file => file.status !== 'anonymized');
  if (problems.length > 0) {
    lines.push('', '## Files Not Anonymized');
    for (const file of problems) {
      lines.push(file.status === 'failed'
        ? `- ${file.id}: ${file.error.code}: ${file.error.message}`
        : `- ${file.id}: skipped (${file.reason})`);
    }
  }

  lines.push(
    '',
    '## Consistency',
    'All occurrences of the same value received the same replacement across all documents.',
    `To restore the original values, run a restoration with ${input.vaultFile}.`,
    ''
  );
  return lines.join('\n');
}

export interface RestorationReportInput {
  generatedAt: Date;
  outputDir: string;
  vaultPath: string;
  files: ReadonlyArray<{ id: string; replacements: number }>;
  totalReplacements: number;
}

export function renderRestorationReport(input: RestorationReportInput): string {
  return [
    '# Restoration Report',
    '',
    `Generated: ${input.generatedAt.toISOString()}`,
    '',
    '## Summary',
    `- Files restored: ${input.files.length}`,
    `- Total replacements: ${input.totalReplacements}`,
    `- Vault used: ${input.vaultPath}`,
    `- Output directory: ${input.outputDir}`,
    '',
    '## Replacements per File',
    ...input.files.map(file => `- ${file.id}: ${file.replacements}`),
    '',
  ].join('\n');
}

export function renderSegmentHeader(segment: DocumentSegment, sourceName: string): string {
  return [
    `<!-- Segment ${segment.segmentNumber} of ${segment.totalSegments} -->`,
    `<!-- Original file: ${sourceName} -->`,
    `<!-- Tokens: ~${segment.tokenCount} -->`,
    `<!-- Lines: ${segment.startLine}-${segment.endLine} -->`,
    '',
  ].join('\n');
}

export interface SegmentationReportInput {
  generatedAt: Date;
  sourceName: string;
  outputDir: string;
  minTokens: number;
  maxTokens: number;
  breakAtHeadings: readonly HeadingLevel[];
  segments: readonly DocumentSegment[];
}

export function renderSegmentationReport(input: SegmentationReportInput): string {
  const lines = [
    '# Segmentation Report',
    '',
    `Generated: ${input.generatedAt.toISOString()}`,
    '',
    '## Summary',
    `- Source file: ${input.sourceName}`,
    `- Total segments: ${input.segments.length}`,
    `- Token range: ${input.minTokens} - ${input.maxTokens}`,
    `- Break preferences: ${input.breakAtHeadings.join(', ')}`,
    `- Output directory: ${input.outputDir}`,
    '',
    '## Segments Created',
  ];

  for (const segment of input.segments) {
    lines.push('', `### Segment ${segment.segmentNumber}`);
    lines.push(`- Tokens: ~${segment.tokenCount}`);
    lines.push(`- Lines: ${segment.startLine}-${segment.endLine}`);
    for (const level of HEADING_LEVELS) {
      const heading = segment.headingContext[level];
      if (heading) lines.push(`- ${level.toUpperCase()}: ${heading}`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

export function renderPromptHeader(prompt: PromptSection, sourceName: string): string {
  const lines = [
    `<!-- Prompt ${prompt.promptNumber} of ${prompt.totalPrompts} -->`,
    `<!-- Original file: ${sourceName} -->`,
    `<!-- Heading: ${prompt.heading} -->`,
    `<!-- Level: H${prompt.level} -->`,
  ];
  if (prompt.parentHeading) {
    lines.push(`<!-- Parent: ${prompt.parentHeading} -->`);
  }
  lines.push('');
  return lines.join('\n');
}

export interface PromptReportInput {
  generatedAt: Date;
  sourceName: string;
  outputDir: string;
  splitLevel: HeadingLevel;
  includeParentContext: boolean;
  templateUsed: boolean;
  prompts: readonly PromptSection[];
}

export function renderPromptReport(input: PromptReportInput): string {
  const lines = [
    '# Prompt Generation Report',
    '',
    `Generated: ${input.generatedAt.toISOString()}`,
    '',
    '## Summary',
    `- Source file: ${input.sourceName}`,
    `- Total prompts: ${input.prompts.length}`,
    `- Split level: ${input.splitLevel}`,
    `- Parent context: ${input.includeParentContext ? 'Included' : 'Not included'}`,
    `- Template used: ${input.templateUsed ? 'Yes' : 'No'}`,
    `- Output directory: ${input.outputDir}`,
    '',
    '## Prompts Created',
  ];

  for (const prompt of input.prompts) {
    lines.push('', `### Prompt ${prompt.promptNumber}: ${prompt.heading}`);
    if (prompt.parentHeading) lines.push(`- Parent: ${prompt.parentHeading}`);
    lines.push(`- Level: H${prompt.level}`);
    lines.push(`- Content length: ${prompt.content.length} characters`);
  }
  lines.push('');
  return lines.join('\n');
}

/**
 * File-name fragment for a heading: alphanumerics, spaces, `-` and `_`
 * kept, spaces turned into `_`, at most 50 characters
 */
export function safeHeading(heading: string): string {
  return heading
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trimEnd()
    .replace(/ /g, '_')
    .slice(0, 50);
}

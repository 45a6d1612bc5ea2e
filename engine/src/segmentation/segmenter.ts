/**
 * docveil: Document Segmenter
 *
 * Cuts a large markdown document into chunks sized for a model's context.
 * A chunk is closed before a preferred heading once it has reached
 * `minTokens`, and before any line that would push it over `maxTokens`.
 * A single line longer than `maxTokens` becomes a chunk of its own.
 *
 * @module segmentation/segmenter
 */

import type { HeadingLevel } from '../contracts/index.js';
import { SegmentationError } from '../errors/index.js';
import { estimateTokens, headingLevelNumber, scanMarkdown, type MarkdownLine } from './markdown.js';

export interface SegmentOptions {
  minTokens?: number;
  maxTokens?: number;
  breakAtHeadings?: readonly HeadingLevel[];
}

export type HeadingContext = Partial<Record<HeadingLevel, string>>;

export interface DocumentSegment {
  segmentNumber: number;
  totalSegments: number;
  content: string;
  tokenCount: number;
  /** 1-based, inclusive */
  startLine: number;
  endLine: number;
  /** Headings in effect where the segment starts */
  headingContext: HeadingContext;
}

const HEADING_LEVELS: readonly HeadingLevel[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

interface OpenSegment {
  lines: MarkdownLine[];
  tokens: number;
  context: HeadingContext;
}

export function segmentLargeDocument(markdown: string, options: SegmentOptions = {}): DocumentSegment[] {
  const maxTokens = options.maxTokens ?? 15000;
  const minTokens = options.minTokens ?? 10000;
  if (maxTokens <= 0 || minTokens <= 0 || minTokens > maxTokens) {
    throw new SegmentationError(`Invalid token range ${minTokens}-${maxTokens}`, { minTokens, maxTokens });
  }
  const breakLevels = new Set((options.breakAtHeadings ?? ['h1', 'h2']).map(headingLevelNumber));

  if (markdown.trim().length === 0) {
    return [];
  }

  const closed: Array<Omit<DocumentSegment, 'segmentNumber' | 'totalSegments'>> = [];
  const headings: string[] = [];
  let current: OpenSegment | null = null;

  const close = (): void => {
    if (!current || current.lines.length === 0) return;
    const first = current.lines[0];
    const last = current.lines[current.lines.length - 1];
    if (!first || !last) return;

    const content = current.lines.map(line => line.text).join('\n');
    closed.push({
      content,
      tokenCount: estimateTokens(content),
      startLine: first.index + 1,
      endLine: last.index + 1,
      headingContext: current.context,
    });
    current = null;
  };

  for (const line of scanMarkdown(markdown)) {
    const lineTokens = estimateTokens(`${line.text}\n`);

    if (current) {
      const preferredBreak = line.headingLevel !== null
        && breakLevels.has(line.headingLevel)
        && current.tokens >= minTokens;
      const overflow = current.tokens + lineTokens > maxTokens;
      if (preferredBreak || overflow) {
        close();
      }
    }

    if (line.headingLevel !== null && line.headingText !== null) {
      headings[line.headingLevel - 1] = line.headingText;
      headings.length = line.headingLevel;
    }

    if (!current) {
      current = { lines: [], tokens: 0, context: contextOf(headings) };
    }
    current.lines.push(line);
    current.tokens += lineTokens;
  }
  close();

  return closed.map((segment, index) => ({
    ...segment,
    segmentNumber: index + 1,
    totalSegments: closed.length,
  }));
}

function contextOf(headings: readonly string[]): HeadingContext {
  const context: HeadingContext = {};
  headings.forEach((text, index) => {
    const level = HEADING_LEVELS[index];
    if (level && text) context[level] = text;
  });
  return context;
}

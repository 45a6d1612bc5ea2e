/**
 * docveil: Markdown Structure
 *
 * Line-level heading scan. ATX headings only; lines inside fenced code
 * blocks are never headings.
 *
 * @module segmentation/markdown
 */

import type { HeadingLevel } from '../contracts/index.js';

export interface MarkdownLine {
  text: string;
  /** 0-based line index */
  index: number;
  /** Heading level 1-6, or null for body lines */
  headingLevel: number | null;
  headingText: string | null;
}

const HEADING = /^ {0,3}(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^ {0,3}(`{3,}|~{3,})/;

export const CHARS_PER_TOKEN = 4;

/**
 * Rough token count used for chunk sizing
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function headingLevelNumber(level: HeadingLevel): number {
  return Number(level.slice(1));
}

export function scanMarkdown(markdown: string): MarkdownLine[] {
  const lines = markdown.split(/\r?\n/);
  let fence: string | null = null;

  return lines.map((text, index) => {
    const fenceMatch = FENCE.exec(text);
    if (fenceMatch?.[1]) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker;
      } else if (marker.charAt(0) === fence.charAt(0) && marker.length >= fence.length) {
        fence = null;
      }
      return { text, index, headingLevel: null, headingText: null };
    }

    if (fence === null) {
      const heading = HEADING.exec(text);
      if (heading?.[1] && heading[2]) {
        return { text, index, headingLevel: heading[1].length, headingText: heading[2] };
      }
    }
    return { text, index, headingLevel: null, headingText: null };
  });
}

/**
 * docveil: Prompt Splitter
 *
 * Splits structured markdown into one prompt per heading at the split level.
 * A section runs until the next heading at the same or a higher level; text
 * before the first such heading is not part of any prompt.
 *
 * Templates may use `{heading}`, `{content}`, `{parent}` and `{level}`.
 *
 * @module segmentation/prompt-splitter
 */

import type { HeadingLevel } from '../contracts/index.js';
import { headingLevelNumber, scanMarkdown } from './markdown.js';

export interface PromptOptions {
  splitLevel?: HeadingLevel;
  includeParentContext?: boolean;
  promptTemplate?: string;
}

export interface PromptSection {
  promptNumber: number;
  totalPrompts: number;
  heading: string;
  level: number;
  parentHeading: string | null;
  /** Rendered prompt text */
  content: string;
}

interface OpenSection {
  heading: string;
  parent: { text: string; level: number } | null;
  body: string[];
}

const TEMPLATE_FIELD = /\{(heading|content|parent|level)\}/g;

export function splitMarkdownIntoPrompts(markdown: string, options: PromptOptions = {}): PromptSection[] {
  const level = headingLevelNumber(options.splitLevel ?? 'h2');
  const includeParent = options.includeParentContext ?? true;

  const sections: OpenSection[] = [];
  const ancestors: Array<{ text: string; level: number }> = [];
  let current: OpenSection | null = null;

  for (const line of scanMarkdown(markdown)) {
    if (line.headingLevel !== null && line.headingText !== null && line.headingLevel <= level) {
      while (ancestors.length > 0 && (ancestors[ancestors.length - 1]?.level ?? 0) >= line.headingLevel) {
        ancestors.pop();
      }

      if (line.headingLevel === level) {
        current = { heading: line.headingText, parent: ancestors[ancestors.length - 1] ?? null, body: [] };
        sections.push(current);
      } else {
        current = null;
      }
      ancestors.push({ text: line.headingText, level: line.headingLevel });
      continue;
    }

    current?.body.push(line.text);
  }

  return sections.map((section, index) => {
    const parent = includeParent ? section.parent : null;
    const body = section.body.join('\n').trim();
    return {
      promptNumber: index + 1,
      totalPrompts: sections.length,
      heading: section.heading,
      level,
      parentHeading: parent?.text ?? null,
      content: options.promptTemplate
        ? renderTemplate(options.promptTemplate, { heading: section.heading, content: body, parent: parent?.text ?? '', level: String(level) })
        : renderDefault(section.heading, level, body, parent),
    };
  });
}

function renderTemplate(template: string, fields: Record<'heading' | 'content' | 'parent' | 'level', string>): string {
  return template.replace(TEMPLATE_FIELD, (_match, field: 'heading' | 'content' | 'parent' | 'level') => fields[field]);
}

function renderDefault(
  heading: string,
  level: number,
  body: string,
  parent: { text: string; level: number } | null
): string {
  const parts: string[] = [];
  if (parent) {
    parts.push(`${'#'.repeat(parent.level)} ${parent.text}`);
  }
  parts.push(`${'#'.repeat(level)} ${heading}`);
  if (body.length > 0) {
    parts.push(body);
  }
  return parts.join('\n\n');
}

export { segmentLargeDocument } from './segmenter.js';
export type { DocumentSegment, HeadingContext, SegmentOptions } from './segmenter.js';
export { splitMarkdownIntoPrompts } from './prompt-splitter.js';
export type { PromptOptions, PromptSection } from './prompt-splitter.js';
export { estimateTokens, scanMarkdown, CHARS_PER_TOKEN } from './markdown.js';
export type { MarkdownLine } from './markdown.js';

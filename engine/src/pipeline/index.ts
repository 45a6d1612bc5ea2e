export { AnonymizationPipeline, drawDateOffset } from './anonymization-pipeline.js';
export type { RunOptions } from './anonymization-pipeline.js';
export { RestorationPipeline, orderForRestoration } from './restoration-pipeline.js';
export type { RestoreOptions } from './restoration-pipeline.js';
export { LiteralReplacer, escapeRegExp, orderLongestFirst, replaceLiterals } from './literal-replace.js';
export type { ReplacementOutcome } from './literal-replace.js';
export { PlaceholderTable, containsPlaceholderMarks, formatPlaceholder, PLACEHOLDER_OPEN, PLACEHOLDER_CLOSE } from './placeholders.js';
export type { PlaceholderEntry } from './placeholders.js';

/**
 * CLI Commands
 *
 * @module cli/commands
 */

export { createAnonymizeCommand } from './anonymize.js';
export { createRestoreCommand } from './restore.js';
export { createExtractCommand } from './extract.js';
export { createSegmentCommand } from './segment.js';
export { createSplitCommand } from './split.js';
export { createVaultCommand } from './vault.js';
export { resolveSelection } from './selection.js';
export type { InputSelection } from './selection.js';

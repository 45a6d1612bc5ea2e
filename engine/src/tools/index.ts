export { anonymizeDocuments, ANONYMIZATION_REPORT, ANONYMIZED_DIR, VAULT_FILE_NAME } from './anonymize-documents.js';
export { restoreDocuments, locateVault, RESTORATION_REPORT, RESTORED_DIR } from './restore-documents.js';
export { extractDocument } from './extract-document.js';
export { segmentDocument, segmentFileName, SEGMENTATION_REPORT, SEGMENTS_DIR } from './segment-document.js';
export { splitIntoPrompts, promptFileName, PROMPT_REPORT, PROMPTS_DIR } from './split-into-prompts.js';
export { findFiles, globToRegExp, outputName } from './files.js';
export type { DiscoveredFile, FileSelection } from './files.js';
export { safeHeading } from './reports.js';
export type { ToolContext } from './context.js';

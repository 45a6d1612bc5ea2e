/**
 * docveil: Contracts
 *
 * Central export point for engine schemas and boundary types.
 *
 * @module contracts
 */

// =============================================================================
// Entity Types
// =============================================================================

export {
  EntityTypeSchema,
  ENTITY_TYPES,
  DEFAULT_ENTITY_TYPES,
  parseEntityType,
  addEntityCounts,
} from './entity-types.js';

export type { EntityType, EntityCounts } from './entity-types.js';

// =============================================================================
// Detection
// =============================================================================

export {
  RawDetectionSchema,
  RawDetectionListSchema,
  DetectionSchema,
} from './detection.js';

export type { RawDetection, Detection } from './detection.js';

// =============================================================================
// Pipeline Configuration
// =============================================================================

export {
  PipelineConfigSchema,
  createPipelineConfig,
  DEFAULT_SCORE_THRESHOLD,
  DEFAULT_DATE_SHIFT_DAYS,
} from './pipeline-config.js';

export type { PipelineConfig, PipelineConfigInput } from './pipeline-config.js';

// =============================================================================
// Vault
// =============================================================================

export {
  VAULT_VERSION,
  VaultMappingSchema,
  VaultRecordSchema,
  VersionedDocumentSchema,
} from './vault.js';

export type { VaultMapping, VaultRecord } from './vault.js';

// =============================================================================
// Batch
// =============================================================================

export type {
  BatchFile,
  SessionTable,
  AnonymizedFile,
  FailedFile,
  SkippedFile,
  FileOutcome,
  BatchResult,
  RestoredFile,
  RestorationResult,
  ProgressReporter,
} from './batch.js';

// =============================================================================
// Tools
// =============================================================================

export {
  HeadingLevelSchema,
  ExtractionMethodSchema,
  AnonymizeDocumentsInputSchema,
  RestoreDocumentsInputSchema,
  ExtractDocumentInputSchema,
  SegmentDocumentInputSchema,
  SplitIntoPromptsInputSchema,
} from './tools.js';

export type {
  HeadingLevel,
  ExtractionMethod,
  AnonymizeDocumentsInput,
  RestoreDocumentsInput,
  ExtractDocumentInput,
  SegmentDocumentInput,
  SplitIntoPromptsInput,
  ProcessingResult,
} from './tools.js';

/**
 * docveil: Batch Contracts
 *
 * Inputs and outputs of one anonymization or restoration invocation.
 *
 * @module contracts/batch
 */

import type { EntityCounts } from './entity-types.js';

/**
 * One document of a batch
 */
export interface BatchFile {
  /** Caller-chosen identifier, usually the source path */
  id: string;
  text: string;
}

export type SessionTable = Map<string, string>;

export interface AnonymizedFile {
  status: 'anonymized';
  id: string;
  text: string;
  /** Occurrences replaced in this file, by type */
  statistics: EntityCounts;
}

export interface FailedFile {
  status: 'failed';
  id: string;
  error: {
    code: string;
    message: string;
  };
}

export interface SkippedFile {
  status: 'skipped';
  id: string;
  reason: 'cancelled';
}

export type FileOutcome = AnonymizedFile | FailedFile | SkippedFile;

export interface BatchResult {
  batchId: string;
  /** One entry per input file, in input order */
  files: FileOutcome[];
  /** Occurrences replaced across the batch, by type */
  statistics: EntityCounts;
  /** Complete session table: seed pairs followed by newly discovered ones */
  mappings: SessionTable;
  /** Pairs discovered during this batch only */
  newMappings: SessionTable;
  dateOffset: number;
  cancelled: boolean;
}

export interface RestoredFile {
  id: string;
  text: string;
  replacements: number;
}

export interface RestorationResult {
  files: RestoredFile[];
  totalReplacements: number;
}

/**
 * Progress callback shared by pipelines and tools; `progress` is 0..1
 */
export type ProgressReporter = (message: string, progress: number) => void;

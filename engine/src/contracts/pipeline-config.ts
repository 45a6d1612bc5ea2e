/**
 * docveil: Pipeline Configuration Contract
 *
 * @module contracts/pipeline-config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_ENTITY_TYPES, EntityTypeSchema, type EntityType } from './entity-types.js';

export const DEFAULT_SCORE_THRESHOLD = 0.5;
export const DEFAULT_DATE_SHIFT_DAYS = 365;

export const PipelineConfigSchema = z.object({
  /** Entity types acted on; detections of other types are discarded */
  entityTypes: z.array(EntityTypeSchema).min(1).default([...DEFAULT_ENTITY_TYPES]),
  /** Detections below this confidence are discarded */
  scoreThreshold: z.number().min(0).max(1).default(DEFAULT_SCORE_THRESHOLD),
  /** Bound for the per-batch date-shift draw, in days */
  dateShiftDays: z.number().int().min(0).default(DEFAULT_DATE_SHIFT_DAYS),
  /** Pins the generator seed; normally left unset so every batch differs */
  seed: z.number().int().optional(),
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export interface PipelineConfig {
  readonly entityTypes: readonly EntityType[];
  readonly scoreThreshold: number;
  readonly dateShiftDays: number;
  readonly seed?: number;
}

/**
 * Validate and freeze a pipeline configuration
 */
export function createPipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid pipeline configuration', result.error.errors);
  }
  const parsed = result.data;
  return Object.freeze({
    ...parsed,
    entityTypes: Object.freeze([...new Set(parsed.entityTypes)]),
  });
}

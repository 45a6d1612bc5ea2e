/**
 * docveil: Detection Contracts
 *
 * Shape of what an entity detector hands back to the engine. Raw detections
 * carry the detector's own label; normalized detections carry an
 * {@link EntityType}.
 *
 * @module contracts/detection
 */

import { z } from 'zod';
import { EntityTypeSchema } from './entity-types.js';

/**
 * A detection as produced by a detector, before normalization
 */
export const RawDetectionSchema = z.object({
  entity_type: z.string().min(1),
  value: z.string(),
  confidence: z.number().min(0).max(1),
});

export type RawDetection = z.infer<typeof RawDetectionSchema>;

export const RawDetectionListSchema = z.array(RawDetectionSchema);

/**
 * A detection after boundary validation
 */
export const DetectionSchema = z.object({
  entity_type: EntityTypeSchema,
  value: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

export type Detection = z.infer<typeof DetectionSchema>;

/**
 * docveil: Detector Capability
 *
 * The engine does not detect entities itself. It asks a {@link Detector} for
 * raw findings and normalizes them here, so that nothing past this boundary
 * sees a label outside the entity-type enumeration.
 *
 * @module detection/detector
 */

import {
  RawDetectionListSchema,
  parseEntityType,
  type Detection,
  type EntityType,
  type RawDetection,
} from '../contracts/index.js';
import { DetectionError } from '../errors/index.js';

export interface ScanOptions {
  /** Types the caller acts on; detectors may use it to narrow their work */
  entityTypes?: readonly EntityType[];
  signal?: AbortSignal;
}

export interface Detector {
  readonly name: string;
  scan(text: string, options?: ScanOptions): Promise<RawDetection[]>;
}

/**
 * Validate detector output and map labels onto {@link EntityType}.
 * Detections with an empty value are dropped.
 *
 * @throws DetectionError when the output does not have the detection shape
 */
export function normalizeDetections(raw: unknown, fileId: string): Detection[] {
  const result = RawDetectionListSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
    throw new DetectionError(fileId, `Detector returned malformed output (${where})`);
  }

  return result.data
    .filter(detection => detection.value.length > 0)
    .map(detection => ({
      entity_type: parseEntityType(detection.entity_type),
      value: detection.value,
      confidence: detection.confidence,
    }));
}

/**
 * docveil: Entity Type Contracts
 *
 * Closed enumeration of the sensitive-data categories the engine acts on.
 * Detector labels are normalized here, at the boundary, so the rest of the
 * engine only ever sees a member of {@link EntityTypeSchema}.
 *
 * @module contracts/entity-types
 */

import { z } from 'zod';

export const EntityTypeSchema = z.enum([
  'PERSON',
  'ORGANIZATION',
  'LOCATION',
  'EMAIL_ADDRESS',
  'PHONE_NUMBER',
  'CREDIT_CARD',
  'US_SSN',
  'PASSPORT',
  'DRIVER_LICENSE',
  'IP_ADDRESS',
  'DATE_TIME',
  'URL',
  'BANK_NUMBER',
  'CRYPTO',
  'MEDICAL_LICENSE',
  'UNKNOWN',
]);

export type EntityType = z.infer<typeof EntityTypeSchema>;

/**
 * Every entity type, in declaration order
 */
export const ENTITY_TYPES: readonly EntityType[] = EntityTypeSchema.options;

/**
 * Default allow-list: every type, UNKNOWN included so that unrecognized
 * detector labels reach the generic fallback.
 */
export const DEFAULT_ENTITY_TYPES: readonly EntityType[] = ENTITY_TYPES;

/**
 * Labels emitted by common detectors that name one of our types differently
 */
const ENTITY_TYPE_ALIASES: Readonly<Record<string, EntityType>> = {
  US_DRIVER_LICENSE: 'DRIVER_LICENSE',
  US_BANK_NUMBER: 'BANK_NUMBER',
  US_PASSPORT: 'PASSPORT',
  EMAIL: 'EMAIL_ADDRESS',
  PHONE: 'PHONE_NUMBER',
  IP: 'IP_ADDRESS',
  ORG: 'ORGANIZATION',
  LOC: 'LOCATION',
  PER: 'PERSON',
};

/**
 * Normalize a detector label to an {@link EntityType}.
 *
 * Matching is case-insensitive; anything outside the enumeration and its
 * aliases becomes `UNKNOWN`.
 */
export function parseEntityType(label: string): EntityType {
  const normalized = label.trim().toUpperCase();
  const direct = EntityTypeSchema.safeParse(normalized);
  if (direct.success) {
    return direct.data;
  }
  return ENTITY_TYPE_ALIASES[normalized] ?? 'UNKNOWN';
}

/**
 * Occurrence counts keyed by entity type; absent types were not seen
 */
export type EntityCounts = Partial<Record<EntityType, number>>;

/**
 * Add `source` counts into `target` in place
 */
export function addEntityCounts(target: EntityCounts, source: EntityCounts): EntityCounts {
  for (const type of ENTITY_TYPES) {
    const count = source[type];
    if (count) {
      target[type] = (target[type] ?? 0) + count;
    }
  }
  return target;
}

/**
 * docveil: Vault Record Contract
 *
 * On-disk layout of a vault file. Field order here is the order written.
 *
 * @module contracts/vault
 */

import { z } from 'zod';
import { EntityTypeSchema } from './entity-types.js';

export const VAULT_VERSION = '2.0';

/**
 * A single `[synthetic, original]` pair
 */
export const VaultMappingSchema = z.tuple([z.string(), z.string().min(1)]);

export type VaultMapping = z.infer<typeof VaultMappingSchema>;

export const VaultRecordSchema = z.object({
  version: z.literal(VAULT_VERSION),
  created_at: z.string().datetime({ offset: true }),
  date_offset: z.number().int(),
  mappings: z.array(VaultMappingSchema),
  statistics: z.record(EntityTypeSchema, z.number().int().min(0)),
  file_count: z.number().int().min(0),
});

export type VaultRecord = z.infer<typeof VaultRecordSchema>;

/**
 * Loose pre-check used to tell a wrong version apart from a malformed file
 */
export const VersionedDocumentSchema = z.object({
  version: z.unknown(),
}).passthrough();

/**
 * docveil: Vault
 *
 * Versioned, serializable store of the original → synthetic mapping table.
 * `serializeVault`, `deserializeVault` and `invertMappings` are pure; the file
 * functions add I/O around them. `deserializeVault` soft-fails so that callers
 * seeding a new batch can fall back to an empty table, while `loadVault` is
 * strict because restoring without a usable mapping corrupts output.
 *
 * @module vault/vault
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { ZodError } from 'zod';
import {
  VAULT_VERSION,
  VaultRecordSchema,
  VersionedDocumentSchema,
  type EntityCounts,
  type SessionTable,
  type VaultRecord,
} from '../contracts/index.js';
import {
  PersistenceError,
  VaultFormatError,
  VaultNotFoundError,
  errorMessage,
} from '../errors/index.js';
import { createLogger, getTelemetry } from '../telemetry/index.js';

const logger = createLogger('vault');

export interface SerializeOptions {
  statistics?: EntityCounts;
  /** Timestamp recorded as `created_at`; defaults to the current time */
  now?: Date;
}

export interface DeserializedVault {
  dateOffset: number | null;
  mappings: SessionTable;
}

export interface VaultSummary {
  version: string;
  createdAt: string;
  dateOffset: number;
  fileCount: number;
  mappingCount: number;
  statistics: EntityCounts;
}

/**
 * Build a version-tagged vault record from an original → synthetic table
 */
export function serializeVault(
  mappings: ReadonlyMap<string, string>,
  dateOffset: number,
  fileCount: number,
  options: SerializeOptions = {}
): VaultRecord {
  return {
    version: VAULT_VERSION,
    created_at: (options.now ?? new Date()).toISOString(),
    date_offset: dateOffset,
    mappings: [...mappings].map(([original, synthetic]): [string, string] => [synthetic, original]),
    statistics: { ...options.statistics },
    file_count: fileCount,
  };
}

/**
 * Original → synthetic table of a validated record, in stored order
 */
export function recordMappings(record: VaultRecord): SessionTable {
  const mappings: SessionTable = new Map();
  for (const [synthetic, original] of record.mappings) {
    mappings.set(original, synthetic);
  }
  return mappings;
}

/**
 * Read a vault record without throwing.
 *
 * Empty input, a missing or unsupported version, and a malformed record all
 * yield `{ dateOffset: null, mappings: <empty> }` and a logged warning.
 */
export function deserializeVault(data: unknown): DeserializedVault {
  const empty = (): DeserializedVault => ({ dateOffset: null, mappings: new Map() });

  const versioned = VersionedDocumentSchema.safeParse(data);
  if (!versioned.success || Object.keys(versioned.data).length === 0) {
    logger.warn('Empty vault data');
    return empty();
  }

  if (versioned.data.version !== VAULT_VERSION) {
    logger.warn({ version: versioned.data.version }, 'Unknown vault version');
    return empty();
  }

  const parsed = VaultRecordSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn({ issues: describeIssues(parsed.error) }, 'Malformed vault data');
    return empty();
  }

  return {
    dateOffset: parsed.data.date_offset,
    mappings: recordMappings(parsed.data),
  };
}

/**
 * Synthetic → original table used for restoration.
 *
 * If two originals share a synthetic value, the later-inserted original wins.
 */
export function invertMappings(mappings: ReadonlyMap<string, string>): Map<string, string> {
  const reverse = new Map<string, string>();
  for (const [original, synthetic] of mappings) {
    if (reverse.has(synthetic)) {
      logger.debug({ synthetic }, 'Synthetic value shared by several originals; keeping the later one');
    }
    reverse.set(synthetic, original);
  }
  return reverse;
}

/**
 * Load and validate a vault file
 *
 * @throws VaultNotFoundError when the file does not exist
 * @throws VaultFormatError when the content is unreadable, not JSON, of an
 * unsupported version, or does not match the record layout
 */
export async function loadVault(vaultPath: string): Promise<VaultRecord> {
  let raw: string;
  try {
    raw = await readFile(vaultPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new VaultNotFoundError(vaultPath);
    }
    throw new VaultFormatError(vaultPath, `cannot be read (${errorMessage(error)})`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new VaultFormatError(vaultPath, 'content is not valid JSON', { cause: error });
  }

  const versioned = VersionedDocumentSchema.safeParse(data);
  if (!versioned.success) {
    throw new VaultFormatError(vaultPath, 'content is not a JSON object');
  }
  if (versioned.data.version !== VAULT_VERSION) {
    throw new VaultFormatError(
      vaultPath,
      `unsupported version ${JSON.stringify(versioned.data.version ?? null)} (expected "${VAULT_VERSION}")`
    );
  }

  const parsed = VaultRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new VaultFormatError(vaultPath, describeIssues(parsed.error));
  }

  logger.debug({ vaultPath, mappings: parsed.data.mappings.length }, 'Vault loaded');
  return parsed.data;
}

/**
 * Write a vault file atomically: the record goes to a temporary sibling that
 * is then renamed over the target.
 *
 * @throws PersistenceError on any I/O fault
 */
export async function saveVault(
  vaultPath: string,
  mappings: ReadonlyMap<string, string>,
  dateOffset: number,
  fileCount: number,
  options: SerializeOptions = {}
): Promise<VaultRecord> {
  const record = serializeVault(mappings, dateOffset, fileCount, options);
  const tempPath = `${vaultPath}.${uuidv4()}.tmp`;

  try {
    await mkdir(path.dirname(vaultPath), { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    await rename(tempPath, vaultPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ tempPath, error: errorMessage(cleanupError) }, 'Failed to remove temporary vault file');
    });
    throw new PersistenceError(vaultPath, `Failed to write vault ${vaultPath}: ${errorMessage(error)}`, { cause: error });
  }

  logger.info({ vaultPath, mappings: record.mappings.length }, 'Vault saved');
  getTelemetry().recordVaultSaved(vaultPath, record.mappings.length);
  return record;
}

export function describeVault(record: VaultRecord): VaultSummary {
  return {
    version: record.version,
    createdAt: record.created_at,
    dateOffset: record.date_offset,
    fileCount: record.file_count,
    mappingCount: record.mappings.length,
    statistics: { ...record.statistics },
  };
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

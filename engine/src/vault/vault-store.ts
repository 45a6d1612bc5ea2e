/**
 * docveil: Vault Store
 *
 * Path-bound handle over one vault file across a session:
 *
 *   absent ──load──▶ loaded ──merge──▶ dirty ──persist──▶ persisted
 *      └─────────────merge──────────────▲                     │
 *                                       └───────merge─────────┘
 *
 * @module vault/vault-store
 */

import {
  addEntityCounts,
  type BatchResult,
  type EntityCounts,
  type SessionTable,
  type VaultRecord,
} from '../contracts/index.js';
import { DocveilError } from '../errors/index.js';
import { createLogger } from '../telemetry/index.js';
import { loadVault, recordMappings, saveVault } from './vault.js';

const logger = createLogger('vault-store');

export type VaultState = 'absent' | 'loaded' | 'dirty' | 'persisted';

export class VaultStore {
  private currentState: VaultState = 'absent';
  private table: SessionTable = new Map();
  private offset: number | null = null;
  private files = 0;
  private statistics: EntityCounts = {};

  /**
   * @param path - File the store persists to
   */
  constructor(readonly path: string) {}

  /**
   * Store seeded from an existing vault file, persisting to `targetPath`
   */
  static async open(sourcePath: string, targetPath: string = sourcePath): Promise<VaultStore> {
    const store = new VaultStore(targetPath);
    await store.load(sourcePath);
    return store;
  }

  get state(): VaultState {
    return this.currentState;
  }

  /**
   * Copy of the original → synthetic table
   */
  get mappings(): SessionTable {
    return new Map(this.table);
  }

  get dateOffset(): number | null {
    return this.offset;
  }

  get fileCount(): number {
    return this.files;
  }

  /**
   * Replace the in-memory content with a vault file's
   *
   * @throws VaultNotFoundError | VaultFormatError
   */
  async load(sourcePath: string = this.path): Promise<VaultRecord> {
    if (this.currentState === 'dirty') {
      throw new DocveilError('INTERNAL_ERROR', `Refusing to load over unsaved changes in ${this.path}`);
    }

    const record = await loadVault(sourcePath);
    this.apply(record);
    this.currentState = 'loaded';
    logger.debug({ sourcePath, mappings: this.table.size }, 'Vault store loaded');
    return record;
  }

  /**
   * Fold a batch result into the store. The result's table already contains
   * any seed pairs, so it replaces the in-memory table.
   */
  merge(result: BatchResult): void {
    this.table = new Map(result.mappings);
    this.offset = result.dateOffset;
    this.files += result.files.filter(file => file.status === 'anonymized').length;
    addEntityCounts(this.statistics, result.statistics);
    this.currentState = 'dirty';
  }

  /**
   * @throws PersistenceError
   */
  async persist(): Promise<VaultRecord> {
    if (this.offset === null) {
      throw new DocveilError('INTERNAL_ERROR', `Nothing to persist to ${this.path}`);
    }

    const record = await saveVault(this.path, this.table, this.offset, this.files, {
      statistics: this.statistics,
    });
    this.currentState = 'persisted';
    return record;
  }

  private apply(record: VaultRecord): void {
    this.table = recordMappings(record);
    this.offset = record.date_offset;
    this.files = record.file_count;
    this.statistics = { ...record.statistics };
  }
}

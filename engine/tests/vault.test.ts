/**
 * docveil: Vault Tests
 *
 * @module tests/vault
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  describeVault,
  deserializeVault,
  invertMappings,
  loadVault,
  recordMappings,
  saveVault,
  serializeVault,
} from '../src/vault/vault.js';
import { VaultStore } from '../src/vault/vault-store.js';
import { VaultFormatError, VaultNotFoundError } from '../src/errors/index.js';
import type { BatchResult } from '../src/contracts/index.js';

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

function batchResult(mappings: Array<[string, string]>, dateOffset: number): BatchResult {
  return {
    batchId: 'batch-1',
    files: [
      { status: 'anonymized', id: 'a.md', text: '', statistics: { PERSON: 2 } },
      { status: 'failed', id: 'b.md', error: { code: 'DETECTION_FAILED', message: 'boom' } },
    ],
    statistics: { PERSON: 2 },
    mappings: new Map(mappings),
    newMappings: new Map(mappings),
    dateOffset,
    cancelled: false,
  };
}

describe('serializeVault', () => {
  it('should store pairs as [synthetic, original] in insertion order', () => {
    const record = serializeVault(
      new Map([['John Smith', 'Jane Doe'], ['john@x.com', 'jd@example.com']]),
      -42,
      3,
      { statistics: { PERSON: 1, EMAIL_ADDRESS: 1 }, now: FIXED_NOW }
    );

    expect(record).toEqual({
      version: '2.0',
      created_at: '2026-03-01T12:00:00.000Z',
      date_offset: -42,
      mappings: [['Jane Doe', 'John Smith'], ['jd@example.com', 'john@x.com']],
      statistics: { PERSON: 1, EMAIL_ADDRESS: 1 },
      file_count: 3,
    });
  });

  it('should round-trip through deserializeVault', () => {
    const mappings = new Map([['Alice', 'Zed'], ['Bob', 'Yan']]);
    const restored = deserializeVault(serializeVault(mappings, 10, 1));

    expect(restored.dateOffset).toBe(10);
    expect([...restored.mappings]).toEqual([['Alice', 'Zed'], ['Bob', 'Yan']]);
  });
});

describe('deserializeVault', () => {
  const emptyResult = { dateOffset: null, mappings: new Map() };

  it('should return an empty table for empty input', () => {
    expect(deserializeVault({})).toEqual(emptyResult);
    expect(deserializeVault(null)).toEqual(emptyResult);
  });

  it('should return an empty table when the version is missing', () => {
    expect(deserializeVault({ mappings: [['a', 'b']], date_offset: 1 })).toEqual(emptyResult);
  });

  it('should return an empty table for an unknown version', () => {
    expect(deserializeVault({ version: '1.0', mappings: [['a', 'b']] })).toEqual(emptyResult);
  });

  it('should return an empty table for a malformed record', () => {
    expect(deserializeVault({ version: '2.0', mappings: 'nope' })).toEqual(emptyResult);
  });
});

describe('invertMappings', () => {
  it('should map synthetic values back to originals', () => {
    const reverse = invertMappings(new Map([['John', 'Pat'], ['Mary', 'Lou']]));
    expect([...reverse]).toEqual([['Pat', 'John'], ['Lou', 'Mary']]);
  });

  it('should keep the later original on a shared synthetic value', () => {
    const reverse = invertMappings(new Map([['first', 'REDACTED_UNKNOWN'], ['second', 'REDACTED_UNKNOWN']]));
    expect(reverse.get('REDACTED_UNKNOWN')).toBe('second');
    expect(reverse.size).toBe(1);
  });
});

describe('vault files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'docveil-vault-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should save and load a vault', async () => {
    const vaultPath = path.join(dir, 'nested', 'vault.json');
    await saveVault(vaultPath, new Map([['John Smith', 'Oscar Navarro']]), 17, 2, {
      statistics: { PERSON: 4 },
      now: FIXED_NOW,
    });

    const record = await loadVault(vaultPath);
    expect(recordMappings(record).get('John Smith')).toBe('Oscar Navarro');
    expect(describeVault(record)).toEqual({
      version: '2.0',
      createdAt: '2026-03-01T12:00:00.000Z',
      dateOffset: 17,
      fileCount: 2,
      mappingCount: 1,
      statistics: { PERSON: 4 },
    });
  });

  it('should write indented JSON and leave no temporary files', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await saveVault(vaultPath, new Map([['a@b.com', 'c@d.com']]), 0, 1, { now: FIXED_NOW });

    const raw = await readFile(vaultPath, 'utf-8');
    expect(raw.startsWith('{\n  "version": "2.0",\n')).toBe(true);
    expect(raw.endsWith('}\n')).toBe(true);
    expect(await readdir(dir)).toEqual(['vault.json']);
  });

  it('should overwrite an existing vault', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await saveVault(vaultPath, new Map([['old', 'x']]), 1, 1);
    await saveVault(vaultPath, new Map([['new', 'y']]), 2, 1);

    const record = await loadVault(vaultPath);
    expect(record.mappings).toEqual([['y', 'new']]);
  });

  it('should raise VaultNotFoundError for a missing file', async () => {
    await expect(loadVault(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(VaultNotFoundError);
  });

  it('should raise VaultFormatError for invalid JSON', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await writeFile(vaultPath, '{ not json');

    await expect(loadVault(vaultPath)).rejects.toThrow(`Vault file ${vaultPath} is unusable: content is not valid JSON`);
  });

  it('should raise VaultFormatError for an unsupported version', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await writeFile(vaultPath, JSON.stringify({ version: '1.0', mappings: [] }));

    await expect(loadVault(vaultPath)).rejects.toThrow('unsupported version "1.0" (expected "2.0")');
  });

  it('should raise VaultFormatError for a record missing fields', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await writeFile(vaultPath, JSON.stringify({ version: '2.0', created_at: FIXED_NOW.toISOString() }));

    const error = await loadVault(vaultPath).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(VaultFormatError);
    expect(error).toHaveProperty('code', 'VAULT_FORMAT');
  });

  it('should raise VaultFormatError for a JSON array', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await writeFile(vaultPath, '[]');

    await expect(loadVault(vaultPath)).rejects.toThrow('content is not a JSON object');
  });
});

describe('VaultStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'docveil-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should move from absent through dirty to persisted', async () => {
    const store = new VaultStore(path.join(dir, 'vault.json'));
    expect(store.state).toBe('absent');

    store.merge(batchResult([['John', 'Pat']], 5));
    expect(store.state).toBe('dirty');
    expect(store.fileCount).toBe(1);

    const record = await store.persist();
    expect(store.state).toBe('persisted');
    expect(record.mappings).toEqual([['Pat', 'John']]);
    expect(record.date_offset).toBe(5);
    expect(record.statistics).toEqual({ PERSON: 2 });
  });

  it('should accumulate file counts across sessions', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    const first = new VaultStore(vaultPath);
    first.merge(batchResult([['John', 'Pat']], 5));
    await first.persist();

    const second = await VaultStore.open(vaultPath);
    expect(second.state).toBe('loaded');
    expect(second.dateOffset).toBe(5);
    expect(second.mappings.get('John')).toBe('Pat');

    second.merge(batchResult([['John', 'Pat'], ['Mary', 'Lou']], 5));
    const record = await second.persist();

    expect(record.file_count).toBe(2);
    expect(record.statistics).toEqual({ PERSON: 4 });
    expect(record.mappings).toEqual([['Pat', 'John'], ['Lou', 'Mary']]);
  });

  it('should refuse to load over unsaved changes', async () => {
    const store = new VaultStore(path.join(dir, 'vault.json'));
    store.merge(batchResult([['a', 'b']], 0));

    await expect(store.load()).rejects.toThrow('Refusing to load over unsaved changes');
  });

  it('should refuse to persist before anything was merged', async () => {
    const store = new VaultStore(path.join(dir, 'vault.json'));
    await expect(store.persist()).rejects.toThrow('Nothing to persist');
  });

  it('should return a copy of its table', () => {
    const store = new VaultStore(path.join(dir, 'vault.json'));
    store.merge(batchResult([['a', 'b']], 0));

    store.mappings.set('c', 'd');
    expect(store.mappings.size).toBe(1);
  });
});

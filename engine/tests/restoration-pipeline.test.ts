/**
 * docveil: Restoration Pipeline Tests
 *
 * @module tests/restoration-pipeline
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { RestorationPipeline, orderForRestoration } from '../src/pipeline/restoration-pipeline.js';
import { saveVault } from '../src/vault/vault.js';
import { VaultNotFoundError } from '../src/errors/index.js';
import { TelemetryEmitter } from '../src/telemetry/index.js';

describe('orderForRestoration', () => {
  it('should try longer synthetic values first', () => {
    const reverse = new Map([['Jon', 'Alice'], ['Jones', 'Bob']]);
    expect(orderForRestoration(reverse)).toEqual([['Jones', 'Bob'], ['Jon', 'Alice']]);
  });
});

describe('RestorationPipeline', () => {
  it('should restore a synthetic value that contains another one', () => {
    const pipeline = new RestorationPipeline(new Map([['Jon', 'Alice'], ['Jones', 'Bob']]), new TelemetryEmitter());

    expect(pipeline.restoreText('Jones met Jon')).toEqual({ text: 'Bob met Alice', replacements: 2 });
  });

  it('should invert batch mappings', () => {
    const pipeline = RestorationPipeline.fromMappings(new Map([['John Smith', 'Oscar Navarro']]));

    expect(pipeline.size).toBe(1);
    expect(pipeline.restoreText('Hi Oscar Navarro').text).toBe('Hi John Smith');
  });

  it('should restore several files and total the replacements', () => {
    const telemetry = new TelemetryEmitter();
    const pipeline = new RestorationPipeline(new Map([['Pat', 'John']]), telemetry);
    const progress: number[] = [];

    const result = pipeline.restore(
      [
        { id: 'a.md', text: 'Pat and Pat' },
        { id: 'b.md', text: 'nobody' },
      ],
      { onProgress: (_message, value) => progress.push(value) }
    );

    expect(result).toEqual({
      files: [
        { id: 'a.md', text: 'John and John', replacements: 2 },
        { id: 'b.md', text: 'nobody', replacements: 0 },
      ],
      totalReplacements: 2,
    });
    expect(progress).toEqual([0, 0.5, 1]);
    expect(telemetry.getMetrics().restorations_total).toBe(1);
  });

  describe('fromVault', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'docveil-restore-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load the reverse table from a vault file', async () => {
      const vaultPath = path.join(dir, 'vault.json');
      await saveVault(vaultPath, new Map([['jane@corp.com', 'pat.lee42@example.com']]), 0, 1);

      const pipeline = await RestorationPipeline.fromVault(vaultPath);

      expect(pipeline.restoreText('Mail pat.lee42@example.com').text).toBe('Mail jane@corp.com');
    });

    it('should fail when the vault is missing', async () => {
      await expect(RestorationPipeline.fromVault(path.join(dir, 'none.json'))).rejects.toBeInstanceOf(VaultNotFoundError);
    });
  });
});

/**
 * docveil: Restoration Pipeline
 *
 * Reverses an anonymization using a vault's inverted table. Restoration is
 * lossless as long as no synthetic value occurs inside another synthetic
 * value's occurrence in the same text; longest-first ordering covers the
 * common case of one synthetic being a substring of another.
 *
 * @module pipeline/restoration-pipeline
 */

import type {
  BatchFile,
  ProgressReporter,
  RestorationResult,
  RestoredFile,
} from '../contracts/index.js';
import { getTelemetry, type TelemetryEmitter } from '../telemetry/index.js';
import { invertMappings, loadVault, recordMappings } from '../vault/index.js';
import { LiteralReplacer, orderLongestFirst } from './literal-replace.js';

/**
 * `(synthetic, original)` pairs in the order restoration tries them
 */
export function orderForRestoration(reverse: ReadonlyMap<string, string>): Array<[string, string]> {
  return orderLongestFirst(reverse.keys()).flatMap((synthetic): Array<[string, string]> => {
    const original = reverse.get(synthetic);
    return original === undefined ? [] : [[synthetic, original]];
  });
}

export interface RestoreOptions {
  onProgress?: ProgressReporter;
}

export class RestorationPipeline {
  private readonly replacer: LiteralReplacer;

  /**
   * @param reverse - synthetic → original
   */
  constructor(reverse: ReadonlyMap<string, string>, private readonly telemetry: TelemetryEmitter = getTelemetry()) {
    this.replacer = new LiteralReplacer(reverse);
  }

  /**
   * @throws VaultNotFoundError | VaultFormatError
   */
  static async fromVault(vaultPath: string): Promise<RestorationPipeline> {
    const record = await loadVault(vaultPath);
    return RestorationPipeline.fromMappings(recordMappings(record));
  }

  /**
   * @param mappings - original → synthetic, as produced by a batch
   */
  static fromMappings(mappings: ReadonlyMap<string, string>): RestorationPipeline {
    return new RestorationPipeline(invertMappings(mappings));
  }

  get size(): number {
    return this.replacer.size;
  }

  restoreText(text: string): { text: string; replacements: number } {
    const outcome = this.replacer.replace(text);
    return { text: outcome.text, replacements: outcome.total };
  }

  restore(files: readonly BatchFile[], options: RestoreOptions = {}): RestorationResult {
    const restored: RestoredFile[] = [];
    let totalReplacements = 0;

    for (const [index, file] of files.entries()) {
      options.onProgress?.(`Restoring ${file.id}`, index / Math.max(files.length, 1));
      const { text, replacements } = this.restoreText(file.text);
      restored.push({ id: file.id, text, replacements });
      totalReplacements += replacements;
    }

    options.onProgress?.('Restoration complete', 1);
    this.telemetry.recordRestoration(files.length, totalReplacements);
    return { files: restored, totalReplacements };
  }
}

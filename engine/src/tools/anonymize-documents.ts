/**
 * docveil: Anonymize Documents Tool
 *
 * Discovers input documents, converts non-text ones to markdown through the
 * extractor registry, anonymizes the batch, persists the vault and writes
 * `anonymized/`, `vault.json` and `REPORT.md` under the output directory.
 *
 * @module tools/anonymize-documents
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  AnonymizeDocumentsInputSchema,
  createPipelineConfig,
  type AnonymizeDocumentsInput,
  type BatchFile,
  type FileOutcome,
  type ProcessingResult,
} from '../contracts/index.js';
import { toErrorInfo } from '../errors/index.js';
import { TEXT_FORMATS } from '../extraction/index.js';
import { AnonymizationPipeline } from '../pipeline/index.js';
import { createLogger } from '../telemetry/index.js';
import { VaultStore } from '../vault/index.js';
import { resolveToolContext, type ResolvedToolContext, type ToolContext } from './context.js';
import { findFiles, outputName, writeOutput, type DiscoveredFile } from './files.js';
import { renderAnonymizationReport } from './reports.js';
import { failureResult, parseToolInput, scaleProgress } from './results.js';

const logger = createLogger('anonymize-documents');

export const VAULT_FILE_NAME = 'vault.json';
export const ANONYMIZED_DIR = 'anonymized';
export const ANONYMIZATION_REPORT = 'REPORT.md';

interface LoadedInputs {
  batch: BatchFile[];
  /** Outcomes for files that never reached the pipeline, keyed by id */
  failures: Map<string, FileOutcome>;
  cancelled: boolean;
}

export async function anonymizeDocuments(
  input: AnonymizeDocumentsInput,
  context: ToolContext = {}
): Promise<ProcessingResult> {
  const ctx = resolveToolContext(context);

  try {
    const params = parseToolInput(AnonymizeDocumentsInputSchema, input);
    const config = createPipelineConfig({
      entityTypes: params.entityTypes,
      scoreThreshold: params.scoreThreshold,
      dateShiftDays: params.dateShiftDays,
    });

    ctx.progress('Scanning for documents...', 0.05);
    const discovered = await findFiles(params);
    if (discovered.length === 0) {
      return {
        success: false,
        outputPaths: [],
        statistics: {},
        message: 'No files found matching the specified patterns',
      };
    }
    ctx.progress(`Found ${discovered.length} files to anonymize`, 0.1);

    const outputDir = path.resolve(params.outputDir);
    const store = new VaultStore(path.join(outputDir, VAULT_FILE_NAME));
    if (params.seedVault) {
      await store.load(params.seedVault);
      logger.info({ seedVault: params.seedVault, mappings: store.mappings.size }, 'Resuming session from vault');
    }

    const inputs = await loadInputs(discovered, ctx);

    const pipeline = new AnonymizationPipeline(config, ctx.detector);
    const result = await pipeline.run(inputs.batch, {
      seedMappings: store.state === 'loaded' ? store.mappings : undefined,
      dateOffset: store.dateOffset ?? undefined,
      signal: ctx.signal,
      onProgress: scaleProgress(ctx.progress, 0.3, 0.8),
    });

    const cancelled = inputs.cancelled || result.cancelled;
    const byId = new Map(result.files.map(outcome => [outcome.id, outcome]));
    const outcomes = discovered.flatMap(file => {
      const outcome = inputs.failures.get(file.absolutePath) ?? byId.get(file.absolutePath);
      return outcome ? [outcome] : [];
    });
    const failures = outcomes.flatMap(outcome =>
      outcome.status === 'failed' ? [{ file: outcome.id, code: outcome.error.code, message: outcome.error.message }] : []
    );
    const anonymizedCount = outcomes.filter(outcome => outcome.status === 'anonymized').length;

    if (anonymizedCount === 0) {
      return {
        success: false,
        outputPaths: [],
        statistics: { files_found: discovered.length, files_failed: failures.length },
        message: cancelled ? 'Anonymization cancelled before any file was processed' : 'No files could be anonymized',
        failures,
      };
    }

    ctx.progress('Saving anonymization vault...', 0.85);
    store.merge(result);
    await store.persist();

    ctx.progress('Writing anonymized documents...', 0.9);
    const outputPaths: string[] = [];
    const taken = new Set<string>();
    for (const file of discovered) {
      const outcome = byId.get(file.absolutePath);
      if (outcome?.status !== 'anonymized') continue;
      const target = path.join(outputDir, ANONYMIZED_DIR, outputName(file.relativePath, '.md', taken));
      await writeOutput(target, outcome.text);
      outputPaths.push(target);
    }

    const totalReplacements = Object.values(result.statistics).reduce((sum, count) => sum + (count ?? 0), 0);
    await writeOutput(path.join(outputDir, ANONYMIZATION_REPORT), renderAnonymizationReport({
      generatedAt: ctx.now(),
      outputDir,
      vaultFile: VAULT_FILE_NAME,
      files: outcomes,
      statistics: result.statistics,
      newMappings: result.newMappings.size,
      totalMappings: result.mappings.size,
      seedVault: params.seedVault,
    }));

    ctx.progress('Anonymization complete!', 1);

    return {
      success: true,
      outputPaths,
      statistics: {
        files_found: discovered.length,
        files_anonymized: anonymizedCount,
        files_failed: failures.length,
        files_skipped: outcomes.filter(outcome => outcome.status === 'skipped').length,
        total_replacements: totalReplacements,
        entities: result.statistics,
        new_mappings: result.newMappings.size,
        total_mappings: result.mappings.size,
        date_offset: result.dateOffset,
      },
      message: cancelled
        ? `Anonymization cancelled after ${anonymizedCount} of ${discovered.length} files`
        : `Successfully anonymized ${anonymizedCount} of ${discovered.length} files`,
      vaultPath: store.path,
      failures: failures.length > 0 ? failures : undefined,
    };
  } catch (error) {
    return failureResult('Anonymization', error);
  }
}

/**
 * Read text inputs directly and extract everything else to markdown.
 * A file that cannot be read or extracted is recorded as failed; once the
 * signal aborts, the files not yet loaded are recorded as skipped.
 */
async function loadInputs(files: readonly DiscoveredFile[], ctx: ResolvedToolContext): Promise<LoadedInputs> {
  const batch: BatchFile[] = [];
  const failures = new Map<string, FileOutcome>();
  const report = scaleProgress(ctx.progress, 0.1, 0.3);

  for (const [index, file] of files.entries()) {
    const id = file.absolutePath;
    if (ctx.signal?.aborted) {
      failures.set(id, { status: 'skipped', id, reason: 'cancelled' });
      continue;
    }
    report(`Reading ${file.relativePath}`, index / files.length);
    try {
      if (TEXT_FORMATS.includes(path.extname(id).toLowerCase())) {
        batch.push({ id, text: await readFile(id, 'utf-8') });
        continue;
      }
      const extractor = await ctx.extractors.select(id, 'auto');
      const extracted = await extractor.extract(id);
      batch.push({ id, text: extracted.markdown });
    } catch (error) {
      const info = toErrorInfo(error);
      logger.warn({ file: id, code: info.code, error: info.message }, 'Skipping unreadable input');
      failures.set(id, { status: 'failed', id, error: { code: info.code, message: info.message } });
    }
  }

  const skipped = [...failures.values()].filter(outcome => outcome.status === 'skipped').length;
  if (skipped > 0) {
    logger.info({ skipped }, 'Input loading cancelled');
  }
  return { batch, failures, cancelled: skipped > 0 };
}

/**
 * docveil: Restore Documents Tool
 *
 * @module tools/restore-documents
 */

import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  RestoreDocumentsInputSchema,
  type BatchFile,
  type ProcessingResult,
  type RestoreDocumentsInput,
} from '../contracts/index.js';
import { VaultNotFoundError } from '../errors/index.js';
import { RestorationPipeline } from '../pipeline/index.js';
import { VAULT_FILE_NAME } from './anonymize-documents.js';
import { resolveToolContext, type ToolContext } from './context.js';
import { findFiles, outputName, writeOutput } from './files.js';
import { renderRestorationReport } from './reports.js';
import { failureResult, parseToolInput, scaleProgress } from './results.js';

export const RESTORED_DIR = 'restored';
export const RESTORATION_REPORT = 'RESTORATION_REPORT.md';

/**
 * Vault next to an anonymized directory: its parent first, then the
 * directory itself
 */
export async function locateVault(directory: string): Promise<string | null> {
  const candidates = [
    path.join(path.dirname(path.resolve(directory)), VAULT_FILE_NAME),
    path.join(path.resolve(directory), VAULT_FILE_NAME),
  ];
  for (const candidate of candidates) {
    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

export async function restoreDocuments(
  input: RestoreDocumentsInput,
  context: ToolContext = {}
): Promise<ProcessingResult> {
  const ctx = resolveToolContext(context);

  try {
    const params = parseToolInput(RestoreDocumentsInputSchema, input);

    ctx.progress('Scanning for anonymized documents...', 0.05);
    const discovered = await findFiles(params);
    if (discovered.length === 0) {
      return {
        success: false,
        outputPaths: [],
        statistics: {},
        message: 'No anonymized files found',
      };
    }

    let vaultPath = params.vaultPath ? path.resolve(params.vaultPath) : null;
    if (!vaultPath && params.directory) {
      vaultPath = await locateVault(params.directory);
    }
    if (!vaultPath) {
      throw new VaultNotFoundError(params.directory
        ? path.join(path.dirname(path.resolve(params.directory)), VAULT_FILE_NAME)
        : VAULT_FILE_NAME);
    }

    ctx.progress('Loading vault data...', 0.15);
    const pipeline = await RestorationPipeline.fromVault(vaultPath);

    const files: BatchFile[] = [];
    for (const file of discovered) {
      files.push({ id: file.relativePath, text: await readFile(file.absolutePath, 'utf-8') });
    }
    const result = pipeline.restore(files, { onProgress: scaleProgress(ctx.progress, 0.2, 0.85) });

    const outputDir = path.resolve(params.outputDir);
    const outputPaths: string[] = [];
    const taken = new Set<string>();
    for (const restored of result.files) {
      const name = outputName(restored.id, path.posix.extname(restored.id), taken);
      const target = path.join(outputDir, RESTORED_DIR, name);
      await writeOutput(target, restored.text);
      outputPaths.push(target);
    }

    ctx.progress('Creating restoration report...', 0.95);
    await writeOutput(path.join(outputDir, RESTORATION_REPORT), renderRestorationReport({
      generatedAt: ctx.now(),
      outputDir,
      vaultPath,
      files: result.files,
      totalReplacements: result.totalReplacements,
    }));

    ctx.progress('Restoration complete!', 1);

    return {
      success: true,
      outputPaths,
      statistics: {
        files_restored: result.files.length,
        total_replacements: result.totalReplacements,
        replacements_per_file: Object.fromEntries(result.files.map(file => [file.id, file.replacements])),
      },
      message: `Successfully restored ${result.files.length} files`,
      vaultPath,
    };
  } catch (error) {
    return failureResult('Restoration', error);
  }
}

/**
 * docveil: Anonymization Pipeline
 *
 * Runs one batch: detection, placeholder substitution and generator lookups
 * for each file in input order, all against a single session table. Files
 * are processed sequentially; the detector call is the only await per file.
 *
 * A file whose detector fails is reported as `failed` and the batch goes on.
 * An aborted signal stops the batch at the next file boundary and the
 * remaining files are reported as `skipped`.
 *
 * @module pipeline/anonymization-pipeline
 */

import { v4 as uuidv4 } from 'uuid';
import {
  addEntityCounts,
  type AnonymizedFile,
  type BatchFile,
  type BatchResult,
  type Detection,
  type EntityCounts,
  type EntityType,
  type FileOutcome,
  type PipelineConfig,
  type ProgressReporter,
  type SessionTable,
} from '../contracts/index.js';
import { normalizeDetections, type Detector } from '../detection/index.js';
import { DetectionError, ReservedCharacterError, errorMessage, toErrorInfo } from '../errors/index.js';
import { createRandom, ReplacementGenerator, type RandomSource } from '../generation/index.js';
import { createLogger, getTelemetry, type TelemetryEmitter } from '../telemetry/index.js';
import { LiteralReplacer } from './literal-replace.js';
import { PlaceholderTable, containsPlaceholderMarks } from './placeholders.js';

const logger = createLogger('anonymization-pipeline');

export interface RunOptions {
  /** original → synthetic pairs from an earlier session; never regenerated */
  seedMappings?: ReadonlyMap<string, string>;
  /** Offset of the session being resumed; drawn fresh when absent */
  dateOffset?: number;
  signal?: AbortSignal;
  onProgress?: ProgressReporter;
}

interface BatchContext {
  batchId: string;
  table: SessionTable;
  generator: ReplacementGenerator;
  signal?: AbortSignal;
}

/**
 * Uniform integer in [-days, days]
 */
export function drawDateOffset(random: RandomSource, days: number): number {
  return random.nextInt(-days, days + 1) || 0;
}

export class AnonymizationPipeline {
  private readonly allowed: ReadonlySet<EntityType>;

  constructor(
    private readonly config: PipelineConfig,
    private readonly detector: Detector,
    private readonly telemetry: TelemetryEmitter = getTelemetry()
  ) {
    this.allowed = new Set(config.entityTypes);
  }

  async run(files: readonly BatchFile[], options: RunOptions = {}): Promise<BatchResult> {
    const batchId = uuidv4();
    const startTime = performance.now();
    const random = createRandom(this.config.seed);
    const dateOffset = options.dateOffset ?? drawDateOffset(random, this.config.dateShiftDays);

    const table: SessionTable = new Map(options.seedMappings ?? []);
    const seeded = new Set(table.keys());
    const context: BatchContext = {
      batchId,
      table,
      generator: new ReplacementGenerator(random, this.telemetry),
      signal: options.signal,
    };

    this.telemetry.recordBatchStarted(batchId, files.length, dateOffset);

    const outcomes: FileOutcome[] = [];
    const statistics: EntityCounts = {};
    let cancelled = false;

    for (const [index, file] of files.entries()) {
      if (options.signal?.aborted) {
        cancelled = true;
        outcomes.push({ status: 'skipped', id: file.id, reason: 'cancelled' });
        continue;
      }

      options.onProgress?.(`Anonymizing ${file.id}`, index / Math.max(files.length, 1));
      const outcome = await this.processFile(file, context);
      if (outcome.status === 'skipped') {
        cancelled = true;
      } else if (outcome.status === 'anonymized') {
        addEntityCounts(statistics, outcome.statistics);
      }
      outcomes.push(outcome);
    }

    options.onProgress?.(cancelled ? 'Anonymization cancelled' : 'Anonymization complete', 1);

    const newMappings: SessionTable = new Map(
      [...table].filter(([original]) => !seeded.has(original))
    );

    this.telemetry.recordBatchCompleted(batchId, performance.now() - startTime, {
      files_total: files.length,
      files_anonymized: outcomes.filter(o => o.status === 'anonymized').length,
      files_failed: outcomes.filter(o => o.status === 'failed').length,
      files_skipped: outcomes.filter(o => o.status === 'skipped').length,
      new_mappings: newMappings.size,
      cancelled,
    });

    return {
      batchId,
      files: outcomes,
      statistics,
      mappings: table,
      newMappings,
      dateOffset,
      cancelled,
    };
  }

  private async processFile(file: BatchFile, context: BatchContext): Promise<FileOutcome> {
    const startTime = performance.now();

    if (containsPlaceholderMarks(file.text)) {
      return this.failed(file, new ReservedCharacterError(file.id), context.batchId);
    }

    let raw: unknown;
    try {
      raw = await this.detector.scan(file.text, {
        entityTypes: this.config.entityTypes,
        signal: context.signal,
      });
    } catch (error) {
      if (context.signal?.aborted) {
        logger.debug({ file: file.id }, 'Detection interrupted by cancellation');
        return { status: 'skipped', id: file.id, reason: 'cancelled' };
      }
      const failure = error instanceof DetectionError
        ? error
        : new DetectionError(file.id, `Detector ${this.detector.name} failed on ${file.id}: ${errorMessage(error)}`, { cause: error });
      return this.failed(file, failure, context.batchId);
    }

    let anonymized: AnonymizedFile;
    try {
      anonymized = this.anonymize(file, normalizeDetections(raw, file.id), context);
    } catch (error) {
      return this.failed(file, error, context.batchId);
    }

    this.telemetry.recordFileAnonymized(context.batchId, file.id, anonymized.statistics, performance.now() - startTime);
    return anonymized;
  }

  private anonymize(
    file: BatchFile,
    detections: Detection[],
    context: BatchContext
  ): AnonymizedFile {
    const placeholders = new PlaceholderTable();
    for (const detection of detections) {
      if (detection.confidence < this.config.scoreThreshold) continue;
      if (!this.allowed.has(detection.entity_type)) continue;
      placeholders.allocate(detection.entity_type, detection.value);
    }

    const sanitized = new LiteralReplacer(placeholders.toSanitizingMap()).replace(file.text);

    const statistics: EntityCounts = {};
    const resolved = new Map<string, string>();
    for (const entry of placeholders.entries) {
      const occurrences = sanitized.counts.get(entry.value) ?? 0;
      if (occurrences === 0) continue;

      statistics[entry.entityType] = (statistics[entry.entityType] ?? 0) + occurrences;
      resolved.set(entry.placeholder, context.generator.generate(entry.entityType, entry.value, context.table));
    }

    const text = new LiteralReplacer(resolved).replace(sanitized.text).text;
    return { status: 'anonymized', id: file.id, text, statistics };
  }

  private failed(file: BatchFile, error: unknown, batchId: string): FileOutcome {
    const info = toErrorInfo(error);
    logger.warn({ file: file.id, code: info.code, error: info.message }, 'File not anonymized');
    this.telemetry.recordFileFailed(batchId, file.id, info.code, info.message);
    return { status: 'failed', id: file.id, error: { code: info.code, message: info.message } };
  }
}

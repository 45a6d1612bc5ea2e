/**
 * docveil: Telemetry Module
 *
 * Structured logging and in-process counters. Every engine module logs
 * through a child of one pino root logger so that level and destination are
 * configured in a single place. Logs go to stderr; stdout belongs to the
 * CLI's own output.
 *
 * @module telemetry
 */

import pino from 'pino';
import type { EntityCounts } from '../contracts/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Telemetry event types
 */
export type TelemetryEventType =
  | 'batch_started'
  | 'file_anonymized'
  | 'file_failed'
  | 'batch_completed'
  | 'vault_saved'
  | 'restoration_completed'
  | 'generation_fallback';

export interface TelemetryEvent {
  event_type: TelemetryEventType;
  timestamp: string;
  batch_id?: string;
  file_id?: string;
  duration_ms?: number;
  metadata?: Record<string, unknown>;
}

export interface TelemetryMetrics {
  batches_total: number;
  files_anonymized: number;
  files_failed: number;
  entities_replaced: number;
  vaults_saved: number;
  restorations_total: number;
  generation_fallbacks: number;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const candidate = value?.toLowerCase();
  return VALID_LOG_LEVELS.find(level => level === candidate) ?? fallback;
}

let rootLogger: pino.Logger | null = null;
const moduleLoggers = new Map<string, pino.Logger>();

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'docveil',
      level: parseLogLevel(process.env['LOG_LEVEL']),
      formatters: {
        level: (label) => ({ level: label }),
      },
    }, pino.destination(2));
  }
  return rootLogger;
}

/**
 * Child logger for one module
 */
export function createLogger(module: string): pino.Logger {
  let logger = moduleLoggers.get(module);
  if (!logger) {
    logger = getRootLogger().child({ module });
    moduleLoggers.set(module, logger);
  }
  return logger;
}

/**
 * Change the level of the root logger and every module logger
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
  for (const logger of moduleLoggers.values()) {
    logger.level = level;
  }
}

/**
 * Telemetry emitter
 *
 * Logs structured events and keeps counters for the lifetime of the process.
 */
export class TelemetryEmitter {
  private readonly logger: pino.Logger;
  private readonly metrics: TelemetryMetrics = {
    batches_total: 0,
    files_anonymized: 0,
    files_failed: 0,
    entities_replaced: 0,
    vaults_saved: 0,
    restorations_total: 0,
    generation_fallbacks: 0,
  };

  constructor(logger: pino.Logger = createLogger('telemetry')) {
    this.logger = logger;
  }

  emit(event: TelemetryEvent): void {
    const level = event.event_type === 'file_failed' ? 'warn' : 'info';
    this.logger[level]({
      event_type: event.event_type,
      timestamp: event.timestamp,
      batch_id: event.batch_id,
      file_id: event.file_id,
      duration_ms: event.duration_ms,
      ...event.metadata,
    }, event.event_type);
  }

  recordBatchStarted(batchId: string, fileCount: number, dateOffset: number): void {
    this.emit({
      event_type: 'batch_started',
      timestamp: new Date().toISOString(),
      batch_id: batchId,
      metadata: { file_count: fileCount, date_offset: dateOffset },
    });
    this.metrics.batches_total++;
  }

  recordFileAnonymized(batchId: string, fileId: string, statistics: EntityCounts, durationMs: number): void {
    const replaced = Object.values(statistics).reduce((sum, count) => sum + (count ?? 0), 0);
    this.emit({
      event_type: 'file_anonymized',
      timestamp: new Date().toISOString(),
      batch_id: batchId,
      file_id: fileId,
      duration_ms: durationMs,
      metadata: { entities_replaced: replaced, entity_types: statistics },
    });
    this.metrics.files_anonymized++;
    this.metrics.entities_replaced += replaced;
  }

  recordFileFailed(batchId: string, fileId: string, code: string, message: string): void {
    this.emit({
      event_type: 'file_failed',
      timestamp: new Date().toISOString(),
      batch_id: batchId,
      file_id: fileId,
      metadata: { code, error: message },
    });
    this.metrics.files_failed++;
  }

  recordBatchCompleted(batchId: string, durationMs: number, metadata: Record<string, unknown>): void {
    this.emit({
      event_type: 'batch_completed',
      timestamp: new Date().toISOString(),
      batch_id: batchId,
      duration_ms: durationMs,
      metadata,
    });
  }

  recordVaultSaved(vaultPath: string, mappingCount: number): void {
    this.emit({
      event_type: 'vault_saved',
      timestamp: new Date().toISOString(),
      metadata: { vault_path: vaultPath, mapping_count: mappingCount },
    });
    this.metrics.vaults_saved++;
  }

  recordRestoration(fileCount: number, replacements: number): void {
    this.emit({
      event_type: 'restoration_completed',
      timestamp: new Date().toISOString(),
      metadata: { file_count: fileCount, replacements },
    });
    this.metrics.restorations_total++;
  }

  recordGenerationFallback(entityType: string): void {
    this.emit({
      event_type: 'generation_fallback',
      timestamp: new Date().toISOString(),
      metadata: { entity_type: entityType },
    });
    this.metrics.generation_fallbacks++;
  }

  getMetrics(): TelemetryMetrics {
    return { ...this.metrics };
  }
}

let globalTelemetry: TelemetryEmitter | null = null;

/**
 * Get global telemetry instance
 */
export function getTelemetry(): TelemetryEmitter {
  if (!globalTelemetry) {
    globalTelemetry = new TelemetryEmitter();
  }
  return globalTelemetry;
}

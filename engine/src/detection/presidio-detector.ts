/**
 * docveil: Presidio Detector
 *
 * Adapter for a Presidio Analyzer deployment. Findings come back as character
 * offsets; they are turned into values against the scanned text before they
 * leave this module.
 *
 * @module detection/presidio-detector
 */

import { z } from 'zod';
import type { EntityType, RawDetection } from '../contracts/index.js';
import { DocveilError, errorMessage } from '../errors/index.js';
import { createLogger } from '../telemetry/index.js';
import type { Detector, ScanOptions } from './detector.js';

const logger = createLogger('presidio-detector');

/**
 * Presidio detector configuration
 */
export interface PresidioDetectorConfig {
  /** Analyzer base URL, e.g. http://localhost:5002 */
  url: string;
  language?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Number of attempts per scan */
  retries?: number;
  /** Delay before the first retry, in milliseconds */
  retryDelay?: number;
  /** Retry backoff multiplier */
  retryBackoff?: number;
}

const PresidioFindingSchema = z.object({
  entity_type: z.string().min(1),
  start: z.number().int().min(0),
  end: z.number().int().min(0),
  score: z.number().min(0).max(1),
});

export type PresidioFinding = z.infer<typeof PresidioFindingSchema>;

const PresidioResponseSchema = z.array(PresidioFindingSchema);

/**
 * Types Presidio names differently; UNKNOWN has no analyzer counterpart
 */
const PRESIDIO_ENTITY_NAMES: Partial<Record<EntityType, string>> = {
  PASSPORT: 'US_PASSPORT',
  DRIVER_LICENSE: 'US_DRIVER_LICENSE',
  BANK_NUMBER: 'US_BANK_NUMBER',
};

export class PresidioDetector implements Detector {
  readonly name = 'presidio';

  private readonly config: Required<PresidioDetectorConfig>;

  constructor(config: PresidioDetectorConfig) {
    this.config = {
      url: config.url.replace(/\/+$/, ''),
      language: config.language ?? 'en',
      timeout: config.timeout ?? 30000,
      retries: config.retries ?? 3,
      retryDelay: config.retryDelay ?? 1000,
      retryBackoff: config.retryBackoff ?? 1.5,
    };
  }

  async scan(text: string, options: ScanOptions = {}): Promise<RawDetection[]> {
    const body: Record<string, unknown> = { text, language: this.config.language };
    const entities = toPresidioEntities(options.entityTypes);
    if (entities) body['entities'] = entities;

    const findings = await this.analyze(body, options.signal);
    return findings.flatMap(finding => {
      if (finding.end <= finding.start || finding.end > text.length) {
        logger.warn({ finding }, 'Discarding finding with out-of-range offsets');
        return [];
      }
      return [{
        entity_type: finding.entity_type,
        value: text.slice(finding.start, finding.end),
        confidence: finding.score,
      }];
    });
  }

  private async analyze(body: Record<string, unknown>, signal?: AbortSignal): Promise<PresidioFinding[]> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.config.retries; attempt++) {
      signal?.throwIfAborted();
      try {
        const response = await this.makeRequest('/analyze', {
          method: 'POST',
          body: JSON.stringify(body),
        }, signal);

        if (response.ok) {
          const parsed = PresidioResponseSchema.safeParse(await response.json());
          if (!parsed.success) {
            throw new DocveilError('DETECTION_FAILED', 'Presidio Analyzer returned an unexpected payload', false, parsed.error.issues);
          }
          return parsed.data;
        }

        // 4xx means the request itself is wrong; repeating it will not help
        if (response.status >= 400 && response.status < 500) {
          const detail = await response.text().catch(() => response.statusText);
          throw new DocveilError('DETECTION_FAILED', `Presidio Analyzer HTTP ${response.status}: ${detail}`, false);
        }

        lastError = new Error(`HTTP ${response.status}: ${response.statusText}`);
      } catch (error) {
        if (error instanceof DocveilError || signal?.aborted) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
      }

      if (attempt < this.config.retries - 1) {
        const delay = Math.pow(this.config.retryBackoff, attempt) * this.config.retryDelay;
        logger.debug({ attempt: attempt + 1, delay, error: lastError.message }, 'Retrying Presidio request');
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }

    throw new DocveilError(
      'DETECTION_FAILED',
      `Presidio Analyzer unavailable after ${this.config.retries} attempts: ${errorMessage(lastError ?? 'unknown error')}`,
      true
    );
  }

  private async makeRequest(path: string, options: RequestInit, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await fetch(`${this.config.url}${path}`, {
        ...options,
        headers: {
          'Content-Type': 'application/json',
          ...options.headers,
        },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

/**
 * Analyzer entity list for an allow-list, or undefined to request every
 * entity the analyzer knows (needed when UNKNOWN is allowed)
 */
function toPresidioEntities(entityTypes?: readonly EntityType[]): string[] | undefined {
  if (!entityTypes || entityTypes.includes('UNKNOWN')) {
    return undefined;
  }
  return entityTypes.map(type => PRESIDIO_ENTITY_NAMES[type] ?? type);
}

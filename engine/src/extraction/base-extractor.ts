/**
 * docveil: Extractor Base
 *
 * File checks and HTTP plumbing shared by the connectors.
 *
 * @module extraction/base-extractor
 */

import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import type pino from 'pino';
import { ExtractionError, errorMessage } from '../errors/index.js';
import { createLogger } from '../telemetry/index.js';
import type {
  ExtractionProgressReporter,
  ExtractionResult,
  Extractor,
  ExtractorCapabilities,
  ExtractorMethod,
  RemoteExtractorOptions,
} from './types.js';

const BYTES_PER_MB = 1024 * 1024;

export abstract class BaseExtractor implements Extractor {
  abstract readonly name: string;
  abstract readonly method: ExtractorMethod;
  abstract readonly capabilities: ExtractorCapabilities;

  abstract isAvailable(): boolean;
  abstract extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult>;

  async validate(filePath: string): Promise<boolean> {
    if (!this.capabilities.supportedFormats.includes(path.extname(filePath).toLowerCase())) {
      return false;
    }
    try {
      const info = await stat(filePath);
      return info.isFile() && info.size / BYTES_PER_MB <= this.capabilities.maxFileSizeMb;
    } catch {
      return false;
    }
  }
}

/**
 * Base for connectors that talk to a remote service
 */
export abstract class RemoteExtractor extends BaseExtractor {
  protected readonly timeout: number;
  protected readonly pollInterval: number;
  protected readonly maxPolls: number;
  protected readonly logger: pino.Logger;

  constructor(loggerName: string, options: RemoteExtractorOptions = {}) {
    super();
    this.timeout = options.timeout ?? 60000;
    this.pollInterval = options.pollInterval ?? 1000;
    this.maxPolls = options.maxPolls ?? 600;
    this.logger = createLogger(loggerName);
  }

  protected async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      throw new ExtractionError(`${this.name} request failed: ${errorMessage(error)}`, { url }, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Parsed JSON body of a successful response
   *
   * @throws ExtractionError on a non-2xx status
   */
  protected async readJson(response: Response, what: string): Promise<unknown> {
    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new ExtractionError(`${this.name} ${what} failed: HTTP ${response.status}: ${detail}`, {
        status: response.status,
      });
    }
    try {
      return await response.json();
    } catch (error) {
      throw new ExtractionError(`${this.name} ${what} returned invalid JSON`, undefined, { cause: error });
    }
  }

  protected wait(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, this.pollInterval));
  }

  /**
   * Progress for poll `attempt`, climbing from 0.1 towards 0.9
   */
  protected pollProgress(attempt: number): number {
    return Math.min(0.9, 0.1 + (0.8 * attempt) / Math.max(this.maxPolls, 1));
  }
}

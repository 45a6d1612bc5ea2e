/**
 * docveil: Extraction Contracts
 *
 * @module extraction/types
 */

import type { ExtractionMethod } from '../contracts/index.js';

export type ExtractorMethod = Exclude<ExtractionMethod, 'auto'>;

export interface ExtractorCapabilities {
  supportsOcr: boolean;
  supportsTables: boolean;
  maxFileSizeMb: number;
  /** Lower-case extensions, dot included */
  supportedFormats: readonly string[];
  requiresApiKey: boolean;
}

export interface ExtractionResult {
  markdown: string;
  metadata: Record<string, unknown>;
  pageCount: number;
  method: ExtractorMethod;
  processingTimeMs: number;
}

/**
 * Extraction progress; `percent` is 0..1
 */
export interface ExtractionProgress {
  message: string;
  percent: number;
}

export type ExtractionProgressReporter = (progress: ExtractionProgress) => void;

export interface Extractor {
  /** Human-readable name */
  readonly name: string;
  readonly method: ExtractorMethod;
  readonly capabilities: ExtractorCapabilities;
  /** Whether the connector is configured */
  isAvailable(): boolean;
  /** Whether this connector can process the file at `filePath` */
  validate(filePath: string): Promise<boolean>;
  /**
   * @throws ExtractionError
   */
  extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult>;
}

/**
 * Polling and timeout settings shared by the remote connectors
 */
export interface RemoteExtractorOptions {
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** Delay between status polls in milliseconds */
  pollInterval?: number;
  /** Polls before giving up */
  maxPolls?: number;
}

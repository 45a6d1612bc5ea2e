/**
 * docveil: Text Extractor
 *
 * Passthrough for documents that are already markdown or plain text.
 *
 * @module extraction/text-extractor
 */

import { readFile } from 'node:fs/promises';
import { ExtractionError, errorMessage } from '../errors/index.js';
import { BaseExtractor } from './base-extractor.js';
import type { ExtractionProgressReporter, ExtractionResult, ExtractorCapabilities } from './types.js';

export const TEXT_FORMATS: readonly string[] = ['.md', '.markdown', '.txt'];

export class TextExtractor extends BaseExtractor {
  readonly name = 'Plain text';
  readonly method = 'text' as const;
  readonly capabilities: ExtractorCapabilities = {
    supportsOcr: false,
    supportsTables: false,
    maxFileSizeMb: 100,
    supportedFormats: TEXT_FORMATS,
    requiresApiKey: false,
  };

  isAvailable(): boolean {
    return true;
  }

  async extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult> {
    const startTime = performance.now();

    let markdown: string;
    try {
      markdown = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ExtractionError(`Cannot read ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
    }
    onProgress?.({ message: 'Read text document', percent: 1 });

    return {
      markdown,
      metadata: { characters: markdown.length },
      pageCount: 1,
      method: this.method,
      processingTimeMs: performance.now() - startTime,
    };
  }
}

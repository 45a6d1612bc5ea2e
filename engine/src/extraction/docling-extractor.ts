/**
 * docveil: Docling Extractor
 *
 * Client for a local docling-serve instance. Conversion is synchronous on
 * the server side, so there is no polling.
 *
 * @module extraction/docling-extractor
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ExtractionError } from '../errors/index.js';
import { RemoteExtractor } from './base-extractor.js';
import type {
  ExtractionProgressReporter,
  ExtractionResult,
  ExtractorCapabilities,
  RemoteExtractorOptions,
} from './types.js';

export interface DoclingExtractorConfig extends RemoteExtractorOptions {
  /** docling-serve base URL, e.g. http://localhost:5001 */
  url?: string;
}

const ConvertResponseSchema = z.object({
  document: z.object({
    filename: z.string().optional(),
    md_content: z.string().nullable().optional(),
  }),
  status: z.string(),
  errors: z.array(z.unknown()).optional(),
  processing_time: z.number().optional(),
});

export class DoclingExtractor extends RemoteExtractor {
  readonly name = 'Docling';
  readonly method = 'docling' as const;
  readonly capabilities: ExtractorCapabilities = {
    supportsOcr: true,
    supportsTables: true,
    maxFileSizeMb: 200,
    supportedFormats: ['.pdf', '.docx', '.pptx', '.html'],
    requiresApiKey: false,
  };

  private readonly url: string | undefined;

  constructor(config: DoclingExtractorConfig = {}) {
    super('docling-extractor', { timeout: 300000, ...config });
    this.url = config.url?.replace(/\/+$/, '');
  }

  isAvailable(): boolean {
    return Boolean(this.url);
  }

  async extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult> {
    if (!this.url) {
      throw new ExtractionError(`${this.name} is not configured`);
    }
    const startTime = performance.now();

    const form = new FormData();
    form.append('files', new Blob([await readFile(filePath)]), path.basename(filePath));
    form.append('to_formats', 'md');

    onProgress?.({ message: 'Converting document', percent: 0.1 });
    const response = await this.request(`${this.url}/v1/convert/file`, { method: 'POST', body: form });
    const parsed = ConvertResponseSchema.safeParse(await this.readJson(response, 'conversion'));
    if (!parsed.success) {
      throw new ExtractionError(`${this.name} returned an unexpected payload`, parsed.error.issues);
    }

    const { document, status, errors } = parsed.data;
    if (status === 'failure' || typeof document.md_content !== 'string') {
      throw new ExtractionError(`${this.name} conversion failed with status ${status}`, { errors });
    }
    if (status !== 'success') {
      this.logger.warn({ filePath, status, errors }, 'Docling conversion finished with warnings');
    }
    onProgress?.({ message: 'Conversion complete', percent: 1 });

    return {
      markdown: document.md_content,
      metadata: { status, serverProcessingTime: parsed.data.processing_time },
      pageCount: 1,
      method: this.method,
      processingTimeMs: performance.now() - startTime,
    };
  }
}

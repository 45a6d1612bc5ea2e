/**
 * docveil: Azure Document Intelligence Extractor
 *
 * Uses the prebuilt layout model over the REST API with markdown output:
 * submit the document, then poll the operation location until it settles.
 *
 * @module extraction/azure-extractor
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ExtractionError } from '../errors/index.js';
import { RemoteExtractor } from './base-extractor.js';
import type {
  ExtractionProgressReporter,
  ExtractionResult,
  ExtractorCapabilities,
  RemoteExtractorOptions,
} from './types.js';

export const AZURE_API_VERSION = '2024-11-30';
export const AZURE_MODEL_ID = 'prebuilt-layout';

export interface AzureExtractorConfig extends RemoteExtractorOptions {
  endpoint?: string;
  apiKey?: string;
}

const AnalyzeOperationSchema = z.object({
  status: z.enum(['notStarted', 'running', 'succeeded', 'failed', 'canceled']),
  error: z.object({ code: z.string().optional(), message: z.string() }).optional(),
  analyzeResult: z.object({
    content: z.string(),
    pages: z.array(z.unknown()).optional(),
    languages: z.array(z.object({ locale: z.string() })).optional(),
  }).optional(),
});

export class AzureExtractor extends RemoteExtractor {
  readonly name = 'Azure Document Intelligence';
  readonly method = 'azure' as const;
  readonly capabilities: ExtractorCapabilities = {
    supportsOcr: true,
    supportsTables: true,
    maxFileSizeMb: 500,
    supportedFormats: ['.pdf', '.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.docx', '.pptx', '.xlsx'],
    requiresApiKey: true,
  };

  private readonly endpoint: string | undefined;
  private readonly apiKey: string | undefined;

  constructor(config: AzureExtractorConfig = {}) {
    super('azure-extractor', config);
    this.endpoint = config.endpoint?.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  isAvailable(): boolean {
    return Boolean(this.endpoint && this.apiKey);
  }

  async extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult> {
    const { endpoint, apiKey } = this;
    if (!endpoint || !apiKey) {
      throw new ExtractionError(`${this.name} is not configured`);
    }
    const startTime = performance.now();
    const document = await readFile(filePath);

    onProgress?.({ message: 'Submitting document', percent: 0.1 });
    const url = `${endpoint}/documentintelligence/documentModels/${AZURE_MODEL_ID}:analyze`
      + `?api-version=${AZURE_API_VERSION}&outputContentFormat=markdown`;
    const submitted = await this.request(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Ocp-Apim-Subscription-Key': apiKey,
      },
      body: JSON.stringify({ base64Source: document.toString('base64') }),
    });

    if (submitted.status !== 202) {
      const detail = await submitted.text().catch(() => submitted.statusText);
      throw new ExtractionError(`${this.name} rejected the document: HTTP ${submitted.status}: ${detail}`, {
        status: submitted.status,
      });
    }
    const operationLocation = submitted.headers.get('operation-location');
    if (!operationLocation) {
      throw new ExtractionError(`${this.name} did not return an operation location`);
    }

    for (let attempt = 1; attempt <= this.maxPolls; attempt++) {
      const polled = await this.request(operationLocation, {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': apiKey },
      });
      const parsed = AnalyzeOperationSchema.safeParse(await this.readJson(polled, 'status poll'));
      if (!parsed.success) {
        throw new ExtractionError(`${this.name} returned an unexpected status payload`, parsed.error.issues);
      }

      const operation = parsed.data;
      if (operation.status === 'succeeded') {
        if (!operation.analyzeResult) {
          throw new ExtractionError(`${this.name} finished without a result`);
        }
        onProgress?.({ message: 'Analysis complete', percent: 1 });
        const pageCount = operation.analyzeResult.pages?.length ?? 1;
        return {
          markdown: operation.analyzeResult.content,
          metadata: {
            modelId: AZURE_MODEL_ID,
            apiVersion: AZURE_API_VERSION,
            language: operation.analyzeResult.languages?.[0]?.locale ?? 'unknown',
          },
          pageCount,
          method: this.method,
          processingTimeMs: performance.now() - startTime,
        };
      }
      if (operation.status === 'failed' || operation.status === 'canceled') {
        throw new ExtractionError(
          `${this.name} analysis ${operation.status}: ${operation.error?.message ?? 'no reason given'}`,
          { code: operation.error?.code }
        );
      }

      onProgress?.({ message: `Analysis ${operation.status}`, percent: this.pollProgress(attempt) });
      await this.wait();
    }

    throw new ExtractionError(`${this.name} analysis did not finish after ${this.maxPolls} polls`);
  }
}

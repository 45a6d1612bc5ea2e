/**
 * docveil: LlamaParse Extractor
 *
 * Upload, poll the job, then fetch the markdown result.
 *
 * @module extraction/llamaparse-extractor
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

export const LLAMAPARSE_BASE_URL = 'https://api.cloud.llamaindex.ai';

export interface LlamaParseExtractorConfig extends RemoteExtractorOptions {
  apiKey?: string;
  baseUrl?: string;
}

const JobSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
});

const MarkdownResultSchema = z.object({
  markdown: z.string(),
  job_metadata: z.object({
    job_pages: z.number().int().optional(),
  }).passthrough().optional(),
});

export class LlamaParseExtractor extends RemoteExtractor {
  readonly name = 'LlamaParse';
  readonly method = 'llamaindex' as const;
  readonly capabilities: ExtractorCapabilities = {
    supportsOcr: true,
    supportsTables: true,
    maxFileSizeMb: 300,
    supportedFormats: ['.pdf', '.docx', '.pptx'],
    requiresApiKey: true,
  };

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(config: LlamaParseExtractorConfig = {}) {
    super('llamaparse-extractor', config);
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? LLAMAPARSE_BASE_URL).replace(/\/+$/, '');
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async extract(filePath: string, onProgress?: ExtractionProgressReporter): Promise<ExtractionResult> {
    if (!this.apiKey) {
      throw new ExtractionError(`${this.name} is not configured`);
    }
    const startTime = performance.now();
    const headers = { Authorization: `Bearer ${this.apiKey}`, Accept: 'application/json' };

    const form = new FormData();
    form.append('file', new Blob([await readFile(filePath)]), path.basename(filePath));

    onProgress?.({ message: 'Uploading document', percent: 0.1 });
    const uploaded = await this.request(`${this.baseUrl}/api/parsing/upload`, {
      method: 'POST',
      headers,
      body: form,
    });
    const job = this.parseJob(await this.readJson(uploaded, 'upload'));
    this.logger.debug({ jobId: job.id }, 'Parsing job created');

    let status = job.status.toUpperCase();
    for (let attempt = 1; status !== 'SUCCESS'; attempt++) {
      if (status === 'ERROR' || status === 'CANCELED') {
        throw new ExtractionError(`${this.name} job ${job.id} ended with status ${status}`, { jobId: job.id });
      }
      if (attempt > this.maxPolls) {
        throw new ExtractionError(`${this.name} job ${job.id} did not finish after ${this.maxPolls} polls`, { jobId: job.id });
      }

      onProgress?.({ message: `Parsing (${status.toLowerCase()})`, percent: this.pollProgress(attempt) });
      await this.wait();
      const polled = await this.request(`${this.baseUrl}/api/parsing/job/${job.id}`, { method: 'GET', headers });
      status = this.parseJob(await this.readJson(polled, 'status poll')).status.toUpperCase();
    }

    const fetched = await this.request(`${this.baseUrl}/api/parsing/job/${job.id}/result/markdown`, {
      method: 'GET',
      headers,
    });
    const result = MarkdownResultSchema.safeParse(await this.readJson(fetched, 'result download'));
    if (!result.success) {
      throw new ExtractionError(`${this.name} returned an unexpected result payload`, result.error.issues);
    }
    onProgress?.({ message: 'Parsing complete', percent: 1 });

    return {
      markdown: result.data.markdown,
      metadata: { jobId: job.id },
      pageCount: result.data.job_metadata?.job_pages ?? 1,
      method: this.method,
      processingTimeMs: performance.now() - startTime,
    };
  }

  private parseJob(payload: unknown): z.infer<typeof JobSchema> {
    const parsed = JobSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExtractionError(`${this.name} returned an unexpected job payload`, parsed.error.issues);
    }
    return parsed.data;
  }
}

/**
 * docveil: Extractor Registry
 *
 * Resolves a connector by method name, or picks one automatically: the first
 * configured connector, in {@link AUTO_SELECT_ORDER}, that accepts the file.
 *
 * @module extraction/registry
 */

import type { ExtractionMethod } from '../contracts/index.js';
import { ExtractionError } from '../errors/index.js';
import { createLogger } from '../telemetry/index.js';
import { AzureExtractor, type AzureExtractorConfig } from './azure-extractor.js';
import { DoclingExtractor, type DoclingExtractorConfig } from './docling-extractor.js';
import { LlamaParseExtractor, type LlamaParseExtractorConfig } from './llamaparse-extractor.js';
import { TextExtractor } from './text-extractor.js';
import type { Extractor, ExtractorMethod } from './types.js';

const logger = createLogger('extractor-registry');

export const AUTO_SELECT_ORDER: readonly ExtractorMethod[] = ['azure', 'llamaindex', 'docling', 'text'];

export interface ExtractionSettings {
  azure?: AzureExtractorConfig;
  llamaParse?: LlamaParseExtractorConfig;
  docling?: DoclingExtractorConfig;
}

export class ExtractorRegistry {
  private readonly extractors = new Map<ExtractorMethod, Extractor>();

  register(extractor: Extractor): this {
    this.extractors.set(extractor.method, extractor);
    return this;
  }

  get(method: ExtractorMethod): Extractor | undefined {
    return this.extractors.get(method);
  }

  /**
   * Registered connectors in auto-selection order
   */
  list(): Extractor[] {
    return AUTO_SELECT_ORDER.flatMap(method => {
      const extractor = this.extractors.get(method);
      return extractor ? [extractor] : [];
    });
  }

  available(): Extractor[] {
    return this.list().filter(extractor => extractor.isAvailable());
  }

  /**
   * First configured connector that accepts the file, or null
   */
  async autoSelect(filePath: string): Promise<Extractor | null> {
    for (const extractor of this.available()) {
      if (await extractor.validate(filePath)) {
        logger.debug({ filePath, method: extractor.method }, 'Extractor selected');
        return extractor;
      }
    }
    return null;
  }

  /**
   * @throws ExtractionError when no usable connector matches
   */
  async select(filePath: string, method: ExtractionMethod = 'auto'): Promise<Extractor> {
    if (method === 'auto') {
      const selected = await this.autoSelect(filePath);
      if (!selected) {
        throw new ExtractionError(
          `No suitable extractor available for ${filePath}. Configure a connector or provide a markdown/text file.`,
          { filePath }
        );
      }
      return selected;
    }

    const extractor = this.get(method);
    if (!extractor) {
      throw new ExtractionError(`Unknown extraction method: ${method}`, { method });
    }
    if (!extractor.isAvailable()) {
      throw new ExtractionError(`${extractor.name} is not available. Check its configuration.`, { method });
    }
    if (!(await extractor.validate(filePath))) {
      throw new ExtractionError(`${extractor.name} cannot process ${filePath}`, { method, filePath });
    }
    return extractor;
  }
}

/**
 * Registry with every built-in connector; remote ones are available only
 * when their settings are present
 */
export function createExtractorRegistry(settings: ExtractionSettings = {}): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new AzureExtractor(settings.azure))
    .register(new LlamaParseExtractor(settings.llamaParse))
    .register(new DoclingExtractor(settings.docling))
    .register(new TextExtractor());
}

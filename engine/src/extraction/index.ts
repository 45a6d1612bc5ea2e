export { BaseExtractor, RemoteExtractor } from './base-extractor.js';
export { TextExtractor, TEXT_FORMATS } from './text-extractor.js';
export { AzureExtractor, AZURE_API_VERSION, AZURE_MODEL_ID } from './azure-extractor.js';
export type { AzureExtractorConfig } from './azure-extractor.js';
export { LlamaParseExtractor, LLAMAPARSE_BASE_URL } from './llamaparse-extractor.js';
export type { LlamaParseExtractorConfig } from './llamaparse-extractor.js';
export { DoclingExtractor } from './docling-extractor.js';
export type { DoclingExtractorConfig } from './docling-extractor.js';
export { ExtractorRegistry, createExtractorRegistry, AUTO_SELECT_ORDER } from './registry.js';
export type { ExtractionSettings } from './registry.js';
export type {
  ExtractionProgress,
  ExtractionProgressReporter,
  ExtractionResult,
  Extractor,
  ExtractorCapabilities,
  ExtractorMethod,
  RemoteExtractorOptions,
} from './types.js';

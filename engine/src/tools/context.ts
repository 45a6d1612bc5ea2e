/**
 * docveil: Tool Context
 *
 * Collaborators a tool call may be given; each has a local default.
 *
 * @module tools/context
 */

import type { ProgressReporter } from '../contracts/index.js';
import { PatternDetector, type Detector } from '../detection/index.js';
import { createExtractorRegistry, type ExtractorRegistry } from '../extraction/index.js';

export interface ToolContext {
  /** Defaults to the local pattern detector */
  detector?: Detector;
  /** Defaults to a registry where only the text connector is available */
  extractors?: ExtractorRegistry;
  onProgress?: ProgressReporter;
  signal?: AbortSignal;
  /** Clock used for report timestamps */
  now?: () => Date;
}

export interface ResolvedToolContext {
  detector: Detector;
  extractors: ExtractorRegistry;
  progress: ProgressReporter;
  signal?: AbortSignal;
  now: () => Date;
}

export function resolveToolContext(context: ToolContext = {}): ResolvedToolContext {
  const onProgress = context.onProgress;
  return {
    detector: context.detector ?? new PatternDetector(),
    extractors: context.extractors ?? createExtractorRegistry(),
    progress: (message, progress) => onProgress?.(message, progress),
    signal: context.signal,
    now: context.now ?? (() => new Date()),
  };
}

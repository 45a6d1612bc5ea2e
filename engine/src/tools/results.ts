/**
 * docveil: Tool Results
 *
 * @module tools/results
 */

import type { z } from 'zod';
import type { ProcessingResult, ProgressReporter } from '../contracts/index.js';
import { ConfigurationError, toErrorInfo } from '../errors/index.js';
import { createLogger } from '../telemetry/index.js';

const logger = createLogger('tools');

/**
 * Validate tool input against its schema
 *
 * @throws ConfigurationError
 */
export function parseToolInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid tool input (${summary})`, result.error.issues);
  }
  return result.data;
}

/**
 * Envelope for a tool that could not complete
 */
export function failureResult(operation: string, error: unknown): ProcessingResult {
  const info = toErrorInfo(error);
  logger.error({ code: info.code, error: info.message }, `${operation} failed`);
  return {
    success: false,
    outputPaths: [],
    statistics: {},
    message: `${operation} failed: ${info.message}`,
    error: { code: info.code, message: info.message },
  };
}

/**
 * Reporter mapping 0..1 onto `[from, to]` of the parent's range
 */
export function scaleProgress(report: ProgressReporter | undefined, from: number, to: number): ProgressReporter {
  return (message, progress) => report?.(message, from + (to - from) * progress);
}

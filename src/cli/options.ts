/**
 * Global CLI options and option validation
 *
 * @module cli/options
 */

import { z } from 'zod';
import { ConfigurationError, EntityTypeSchema, HeadingLevelSchema, type EntityType, type HeadingLevel } from '@docveil/engine';
import type { OutputFormat } from './formatters.js';

export interface CliConfig {
  outputFormat: OutputFormat;
  noColor: boolean;
  verbose: boolean;
  quiet: boolean;
}

export const GlobalOptionsSchema = z.object({
  format: z.enum(['table', 'json']).default('table'),
  color: z.boolean().default(true),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export type GlobalOptions = z.output<typeof GlobalOptionsSchema>;

let globalConfig: CliConfig = {
  outputFormat: 'table',
  noColor: false,
  verbose: false,
  quiet: false,
};

export function getCliConfig(): CliConfig {
  return globalConfig;
}

export function setCliConfig(options: GlobalOptions): CliConfig {
  globalConfig = {
    outputFormat: options.format,
    noColor: !options.color,
    verbose: options.verbose,
    quiet: options.quiet,
  };
  return globalConfig;
}

/**
 * Validate raw commander option values
 *
 * @throws ConfigurationError
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.length > 0 ? `--${toKebab(issue.path.join('.'))}` : 'options'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid options (${summary})`, result.error.issues);
  }
  return result.data;
}

function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}

/**
 * Split a comma-separated option value, dropping empty items
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * `person,email_address` → `['PERSON', 'EMAIL_ADDRESS']`
 *
 * @throws ConfigurationError on an unknown type
 */
export function parseEntityTypes(value: string): EntityType[] {
  return splitList(value).map(item => {
    const parsed = EntityTypeSchema.safeParse(item.toUpperCase());
    if (!parsed.success) {
      throw new ConfigurationError(`Unknown entity type: ${item}`);
    }
    return parsed.data;
  });
}

/**
 * `h1,H2` → `['h1', 'h2']`
 *
 * @throws ConfigurationError on an unknown level
 */
export function parseHeadingLevels(value: string): HeadingLevel[] {
  return splitList(value).map(item => {
    const parsed = HeadingLevelSchema.safeParse(item.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(`Unknown heading level: ${item}`);
    }
    return parsed.data;
  });
}

/**
 * Commander argument parser for repeatable options
 */
export function collectValues(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

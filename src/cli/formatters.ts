/**
 * Output Formatters
 *
 * Renders tool results and vault summaries as tables or JSON.
 *
 * @module cli/formatters
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type { ProcessingResult, VaultSummary } from '@docveil/engine';

/**
 * Supported output formats
 */
export type OutputFormat = 'table' | 'json';

export interface TableOptions {
  colWidths?: number[];
  wordWrap?: boolean;
  compact?: boolean;
}

/**
 * Create a formatted table
 */
export function createTable(headers: string[], options: TableOptions = {}): Table.Table {
  const tableOptions: Table.TableConstructorOptions = {
    head: headers.map(h => chalk.bold(h)),
    style: {
      head: [],
      border: [],
      compact: options.compact,
    },
    wordWrap: options.wordWrap ?? true,
  };

  if (options.colWidths) {
    tableOptions.colWidths = options.colWidths;
  }

  return new Table(tableOptions);
}

export function formatJson(data: unknown, compact: boolean = false): string {
  return compact ? JSON.stringify(data) : JSON.stringify(data, null, 2);
}

/**
 * Truncate string to specified length
 */
export function truncate(str: string, maxLength: number, suffix: string = '...'): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }

  return `${seconds}.${String(ms % 1000).padStart(3, '0')}s`;
}

/**
 * Render a statistics value on one line
 *
 * Entity counts and other flat records become `KEY: n, KEY: n`.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '-';
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? '-' : value.map(formatValue).join(', ');
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value);
    return entries.length === 0 ? '-' : entries.map(([key, inner]) => `${key}: ${formatValue(inner)}`).join(', ');
  }
  return String(value);
}

/**
 * Colorize status values
 */
export function colorizeStatus(status: string): string {
  const statusLower = status.toLowerCase();

  if (['success', 'ok', 'anonymized', 'restored', 'set'].includes(statusLower)) {
    return chalk.green(status);
  }

  if (['skipped', 'partial'].includes(statusLower)) {
    return chalk.yellow(status);
  }

  if (['error', 'failed'].includes(statusLower)) {
    return chalk.red(status);
  }

  return status;
}

/**
 * Format an error for display
 */
export function formatError(error: Error | string, verbose: boolean = false): string {
  if (typeof error === 'string') {
    return chalk.red('Error: ') + error;
  }

  let output = chalk.red('Error: ') + error.message;

  if (verbose && error.stack) {
    output += '\n' + chalk.dim(error.stack);
  }

  return output;
}

const MAX_LISTED_OUTPUTS = 20;

/**
 * Render a tool result: headline, statistics, outputs and failures
 */
export function formatResult(result: ProcessingResult, format: OutputFormat): string {
  if (format === 'json') {
    return formatJson(result);
  }

  const lines: string[] = [];
  lines.push(result.success ? `${chalk.green('✓')} ${result.message}` : `${chalk.red('✗')} ${result.message}`);

  const statistics = Object.entries(result.statistics);
  if (statistics.length > 0) {
    const table = createTable(['Statistic', 'Value']);
    for (const [key, value] of statistics) {
      table.push([key, formatValue(value)]);
    }
    lines.push(table.toString());
  }

  if (result.outputPaths.length > 0) {
    lines.push(chalk.bold('Outputs:'));
    for (const outputPath of result.outputPaths.slice(0, MAX_LISTED_OUTPUTS)) {
      lines.push(`  ${outputPath}`);
    }
    if (result.outputPaths.length > MAX_LISTED_OUTPUTS) {
      lines.push(chalk.dim(`  ... and ${result.outputPaths.length - MAX_LISTED_OUTPUTS} more`));
    }
  }

  if (result.vaultPath) {
    lines.push(`${chalk.bold('Vault:')} ${result.vaultPath}`);
  }

  if (result.failures && result.failures.length > 0) {
    const table = createTable(['File', 'Code', 'Reason']);
    for (const failure of result.failures) {
      table.push([failure.file, colorizeStatus(failure.code), truncate(failure.message, 60)]);
    }
    lines.push(chalk.bold('Failures:'));
    lines.push(table.toString());
  }

  return lines.join('\n');
}

/**
 * Render a vault summary and, optionally, its first mappings
 */
export function formatVaultSummary(
  summary: VaultSummary,
  mappings: ReadonlyArray<readonly [string, string]> | null,
  format: OutputFormat
): string {
  if (format === 'json') {
    return formatJson(mappings ? { ...summary, mappings } : summary);
  }

  const table = createTable(['Field', 'Value']);
  table.push(
    ['Version', summary.version],
    ['Created', summary.createdAt],
    ['Date offset', `${summary.dateOffset} days`],
    ['Files', String(summary.fileCount)],
    ['Mappings', String(summary.mappingCount)],
    ['Entities', formatValue(summary.statistics)]
  );
  const lines = [table.toString()];

  if (mappings && mappings.length > 0) {
    const mappingTable = createTable(['Synthetic', 'Original']);
    for (const [synthetic, original] of mappings.slice(0, MAX_LISTED_OUTPUTS)) {
      mappingTable.push([synthetic, chalk.dim(truncate(original, 40))]);
    }
    lines.push(mappingTable.toString());
    if (mappings.length > MAX_LISTED_OUTPUTS) {
      lines.push(chalk.dim(`  ... and ${mappings.length - MAX_LISTED_OUTPUTS} more`));
    }
  }

  return lines.join('\n');
}

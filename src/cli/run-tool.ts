/**
 * Tool runner shared by the document commands
 *
 * @module cli/run-tool
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { createExtractorRegistry, type ProcessingResult, type ToolContext } from '@docveil/engine';
import { createDetector, extractionSettings, getConfig, type RuntimeConfig } from '../runtime/config.js';
import { formatDuration, formatError, formatResult } from './formatters.js';
import { getCliConfig } from './options.js';

export type ToolRun = (context: ToolContext, config: RuntimeConfig) => Promise<ProcessingResult>;

/**
 * Run a tool with a spinner, print its result and set the exit code
 *
 * Ctrl-C aborts the run at the next file boundary.
 */
export async function runTool(label: string, run: ToolRun): Promise<ProcessingResult> {
  const cli = getCliConfig();
  const config = getConfig();
  const spinner: Ora | null = cli.quiet || cli.outputFormat === 'json' ? null : ora(`${label}...`).start();
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (spinner) spinner.text = 'Cancelling after the current file...';
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  const startedAt = Date.now();

  try {
    const result = await run({
      detector: createDetector(config),
      extractors: createExtractorRegistry(extractionSettings(config)),
      signal: controller.signal,
      onProgress: (message, progress) => {
        if (spinner) spinner.text = `${message} ${chalk.dim(`${Math.round(progress * 100)}%`)}`;
      },
    }, config);

    if (spinner) {
      if (result.success) {
        spinner.stop();
      } else {
        spinner.fail(`${label} failed`);
      }
    }
    if (!cli.quiet || !result.success) {
      console.log(formatResult(result, cli.outputFormat));
    }
    if (!cli.quiet && cli.outputFormat === 'table') {
      console.log(chalk.dim(`Finished in ${formatDuration(Date.now() - startedAt)}`));
    }
    if (!result.success) {
      process.exitCode = 1;
    }
    return result;
  } catch (error) {
    if (spinner) spinner.fail(`${label} failed`);
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Error handler for failures outside a tool result
 */
export function handleError(error: unknown): void {
  const cli = getCliConfig();
  if (error instanceof Error) {
    console.error(formatError(error, cli.verbose));
  } else {
    console.error(formatError(String(error)));
  }
  process.exitCode = 1;
}

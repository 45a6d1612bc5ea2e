/**
 * Input selection shared by the batch commands
 *
 * @module cli/commands/selection
 */

import { stat } from 'node:fs/promises';
import { ConfigurationError } from '@docveil/engine';

export interface InputSelection {
  files?: string[];
  directory?: string;
}

/**
 * One directory argument selects a directory scan; anything else is a file list
 *
 * @throws ConfigurationError when no input is given
 */
export async function resolveSelection(paths: readonly string[]): Promise<InputSelection> {
  const [first, ...rest] = paths;
  if (first === undefined) {
    throw new ConfigurationError('Give at least one file or a directory');
  }
  if (rest.length === 0 && await isDirectory(first)) {
    return { directory: first };
  }
  return { files: [...paths] };
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    // Missing paths are reported by the tool as missing inputs.
    return false;
  }
}

#!/usr/bin/env node
/**
 * docveil CLI
 *
 * Command-line interface for document extraction, reversible anonymization
 * and chunking.
 *
 * @module cli
 */

import { createProgram } from './program.js';
import { handleError } from './run-tool.js';

const program = createProgram();

// Show help if no command provided
if (process.argv.length === 2) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch(handleError);
}

/**
 * Vault Command
 *
 * Inspection of vault files written by `anonymize`.
 *
 * @module cli/commands/vault
 */

import { Command } from 'commander';
import { z } from 'zod';
import { describeVault, loadVault } from '@docveil/engine';
import { formatVaultSummary } from '../formatters.js';
import { getCliConfig, parseOptions } from '../options.js';
import { handleError } from '../run-tool.js';

const InspectOptionsSchema = z.object({
  mappings: z.boolean().default(false),
});

function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show the summary of a vault file')
    .argument('<path>', 'Vault file')
    .option('--mappings', 'Also list synthetic → original mappings')
    .action(async (vaultPath: string, rawOptions: unknown) => {
      try {
        const options = parseOptions(InspectOptionsSchema, rawOptions);
        const record = await loadVault(vaultPath);
        console.log(formatVaultSummary(
          describeVault(record),
          options.mappings ? record.mappings : null,
          getCliConfig().outputFormat
        ));
      } catch (error) {
        handleError(error);
      }
    });
}

export function createVaultCommand(): Command {
  return new Command('vault')
    .description('Work with anonymization vaults')
    .addCommand(createInspectCommand());
}

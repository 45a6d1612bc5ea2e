/**
 * docveil: CLI Program Tests
 *
 * @module cli/program.test
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { saveVault } from '@docveil/engine';
import { createProgram } from './program.js';

describe('docveil program', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram().exitOverride();
    await program.parseAsync(['node', 'docveil', '--no-color', '--log-level', 'silent', ...args]);
  };

  const printed = (): string => log.mock.calls.map(call => call.map(String).join(' ')).join('\n');

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'docveil-cli-'));
    process.exitCode = undefined;
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('should register every command', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual([
      'anonymize',
      'restore',
      'extract',
      'segment',
      'split',
      'vault',
      'version',
    ]);
  });

  it('should segment a document', async () => {
    const input = path.join(dir, 'notes.md');
    await writeFile(input, '# Notes\nHello there.');
    const output = path.join(dir, 'out');

    await run('-q', 'segment', input, '-o', output);

    expect(process.exitCode).toBeUndefined();
    expect(await readdir(path.join(output, 'segments'))).toEqual(['notes_001_of_001.md']);
    const segment = await readFile(path.join(output, 'segments', 'notes_001_of_001.md'), 'utf-8');
    expect(segment.startsWith('<!-- Segment 1 of 1 -->\n')).toBe(true);
    expect(segment.endsWith('\n\n# Notes\nHello there.\n')).toBe(true);
    expect(log).not.toHaveBeenCalled();
  });

  it('should print a failed result as JSON and exit non-zero', async () => {
    const input = path.join(dir, 'notes.md');
    await writeFile(input, '# Notes\n## Only h2');

    await run('-f', 'json', 'split', input, '-o', path.join(dir, 'out'), '--level', 'h3');

    expect(process.exitCode).toBe(1);
    expect(JSON.parse(printed())).toEqual({
      success: false,
      outputPaths: [],
      statistics: {},
      message: 'No h3 headings found in document',
    });
  });

  it('should inspect a vault', async () => {
    const vaultPath = path.join(dir, 'vault.json');
    await saveVault(vaultPath, new Map([['jane@corp.com', 'pat.lee42@example.com']]), 12, 1);

    await run('-f', 'json', 'vault', 'inspect', vaultPath, '--mappings');

    expect(JSON.parse(printed())).toMatchObject({
      version: '2.0',
      dateOffset: 12,
      fileCount: 1,
      mappingCount: 1,
      mappings: [['pat.lee42@example.com', 'jane@corp.com']],
    });
  });

  it('should report invalid options', async () => {
    await run('anonymize', path.join(dir, 'a.md'), '-o', path.join(dir, 'out'), '-e', 'person,bogus');

    expect(process.exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith('Error: Unknown entity type: bogus');
  });

  it('should reject an unknown output format', async () => {
    await expect(run('-f', 'yaml', 'version')).rejects.toThrow(/^Invalid options \(--format: /);
  });
});

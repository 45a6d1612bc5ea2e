/**
 * docveil: Document Tool Tests
 *
 * End-to-end runs of the tools against temporary directories.
 *
 * @module tests/tools
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { anonymizeDocuments } from '../src/tools/anonymize-documents.js';
import { restoreDocuments } from '../src/tools/restore-documents.js';
import { extractDocument } from '../src/tools/extract-document.js';
import { segmentDocument, segmentFileName } from '../src/tools/segment-document.js';
import { splitIntoPrompts, promptFileName } from '../src/tools/split-into-prompts.js';
import { findFiles, globToRegExp, outputName } from '../src/tools/files.js';
import { safeHeading } from '../src/tools/reports.js';
import { loadVault, recordMappings } from '../src/vault/vault.js';
import { ExtractorRegistry, type Extractor } from '../src/extraction/index.js';

const FIXED_NOW = new Date('2026-05-04T08:30:00.000Z');
const now = (): Date => FIXED_NOW;

const LETTER = 'Dr. John Smith wrote to jane@corp.com.';
const REPLY = 'Reply to jane@corp.com today.';

/**
 * Registry with one connector that accepts anything and records its calls
 */
function recordingExtractors(onExtract: (filePath: string) => void = () => {}): { registry: ExtractorRegistry; calls: string[] } {
  const calls: string[] = [];
  const extractor: Extractor = {
    name: 'Recording',
    method: 'docling',
    capabilities: {
      supportsOcr: false,
      supportsTables: false,
      maxFileSizeMb: 10,
      supportedFormats: ['.pdf'],
      requiresApiKey: false,
    },
    isAvailable: () => true,
    validate: async () => true,
    extract: async (filePath) => {
      calls.push(filePath);
      onExtract(filePath);
      return { markdown: 'Scanned by John Smith.', metadata: {}, pageCount: 1, method: 'docling', processingTimeMs: 1 };
    },
  };
  return { registry: new ExtractorRegistry().register(extractor), calls };
}

describe('document tools', () => {
  let dir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'docveil-tools-'));
    inputDir = path.join(dir, 'in');
    outputDir = path.join(dir, 'out');
    await mkdir(inputDir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('findFiles', () => {
    it('should match patterns by file name and sort results', async () => {
      await mkdir(path.join(inputDir, 'sub'));
      await writeFile(path.join(inputDir, 'b.md'), '');
      await writeFile(path.join(inputDir, 'a.txt'), '');
      await writeFile(path.join(inputDir, 'skip.json'), '');
      await writeFile(path.join(inputDir, 'sub', 'c.md'), '');

      const found = await findFiles({ directory: inputDir, patterns: ['*.md', '*.txt'], recursive: true });
      const shallow = await findFiles({ directory: inputDir, patterns: ['*.md'], recursive: false });

      expect(found.map(file => file.relativePath)).toEqual(['a.txt', 'b.md', 'sub/c.md']);
      expect(shallow.map(file => file.relativePath)).toEqual(['b.md']);
    });

    it('should report a missing directory', async () => {
      await expect(findFiles({ directory: path.join(dir, 'nope'), patterns: ['*'], recursive: true }))
        .rejects.toThrow(`Directory not found: ${path.join(dir, 'nope')}`);
    });

    it('should require files or a directory', async () => {
      await expect(findFiles({ patterns: ['*'], recursive: true }))
        .rejects.toThrow("Either 'files' or 'directory' must be provided");
    });
  });

  describe('file naming helpers', () => {
    it('should compile globs', () => {
      expect(globToRegExp('*.md').test('notes.md')).toBe(true);
      expect(globToRegExp('*.md').test('dir/notes.md')).toBe(false);
      expect(globToRegExp('**/*.{md,txt}').test('dir/deep/notes.txt')).toBe(true);
      expect(globToRegExp('file?.md').test('file1.md')).toBe(true);
    });

    it('should make output names unique', () => {
      const taken = new Set<string>();
      expect(outputName('report.pdf', '.md', taken)).toBe('report.md');
      expect(outputName('report.md', '.md', taken)).toBe('report_2.md');
      expect(outputName('sub/report.txt', '.md', taken)).toBe('sub/report.md');
    });

    it('should build safe heading fragments', () => {
      expect(safeHeading('Q&A: Getting Started!')).toBe('QA_Getting_Started');
      expect(safeHeading('x'.repeat(60))).toHaveLength(50);
      expect(segmentFileName('guide', 2, 12)).toBe('guide_002_of_012.md');
      expect(promptFileName('guide', 3, 'Set up')).toBe('guide_003_Set_up.md');
    });
  });

  describe('anonymizeDocuments and restoreDocuments', () => {
    beforeEach(async () => {
      await writeFile(path.join(inputDir, 'letter.md'), LETTER);
      await writeFile(path.join(inputDir, 'reply.txt'), REPLY);
    });

    it('should anonymize consistently and restore the originals', async () => {
      const anonymized = await anonymizeDocuments({ directory: inputDir, outputDir }, { now });

      expect(anonymized.success).toBe(true);
      expect(anonymized.message).toBe('Successfully anonymized 2 of 2 files');
      expect(anonymized.outputPaths).toEqual([
        path.join(outputDir, 'anonymized', 'letter.md'),
        path.join(outputDir, 'anonymized', 'reply.md'),
      ]);
      expect(anonymized.vaultPath).toBe(path.join(outputDir, 'vault.json'));
      expect(anonymized.statistics).toMatchObject({
        files_found: 2,
        files_anonymized: 2,
        files_failed: 0,
        total_replacements: 3,
        entities: { PERSON: 1, EMAIL_ADDRESS: 2 },
        new_mappings: 2,
        total_mappings: 2,
      });

      const mappings = recordMappings(await loadVault(path.join(outputDir, 'vault.json')));
      const person = mappings.get('John Smith');
      const email = mappings.get('jane@corp.com');
      expect(await readFile(path.join(outputDir, 'anonymized', 'letter.md'), 'utf-8'))
        .toBe(`Dr. ${person} wrote to ${email}.`);
      expect(await readFile(path.join(outputDir, 'anonymized', 'reply.md'), 'utf-8'))
        .toBe(`Reply to ${email} today.`);

      const report = await readFile(path.join(outputDir, 'REPORT.md'), 'utf-8');
      expect(report).toContain('- Files processed: 2 of 2');
      expect(report).toContain('- PERSON: 1\n- EMAIL_ADDRESS: 2');

      const restoredDir = path.join(dir, 'restored-out');
      const restored = await restoreDocuments(
        { directory: path.join(outputDir, 'anonymized'), outputDir: restoredDir },
        { now }
      );

      expect(restored.success).toBe(true);
      expect(restored.statistics).toEqual({
        files_restored: 2,
        total_replacements: 3,
        replacements_per_file: { 'letter.md': 2, 'reply.md': 1 },
      });
      expect(await readFile(path.join(restoredDir, 'restored', 'letter.md'), 'utf-8')).toBe(LETTER);
      expect(await readFile(path.join(restoredDir, 'restored', 'reply.md'), 'utf-8')).toBe(REPLY);
      const restorationReport = await readFile(path.join(restoredDir, 'RESTORATION_REPORT.md'), 'utf-8');
      expect(restorationReport).toContain('- Files restored: 2');
      expect(restorationReport).toContain('## Replacements per File\n- letter.md: 2\n- reply.md: 1\n');
    });

    it('should reuse a seed vault across sessions', async () => {
      const first = await anonymizeDocuments({ files: [path.join(inputDir, 'letter.md')], outputDir }, { now });
      expect(first.success).toBe(true);
      const firstVault = await loadVault(path.join(outputDir, 'vault.json'));

      const secondOut = path.join(dir, 'second');
      const second = await anonymizeDocuments({
        files: [path.join(inputDir, 'reply.txt')],
        outputDir: secondOut,
        seedVault: path.join(outputDir, 'vault.json'),
      }, { now });

      expect(second.statistics).toMatchObject({ new_mappings: 0, total_mappings: 2 });
      const secondVault = await loadVault(path.join(secondOut, 'vault.json'));
      expect(secondVault.date_offset).toBe(firstVault.date_offset);
      expect(secondVault.file_count).toBe(2);
      expect(recordMappings(secondVault).get('jane@corp.com')).toBe(recordMappings(firstVault).get('jane@corp.com'));
    });

    it('should record files that cannot be extracted and keep going', async () => {
      await writeFile(path.join(inputDir, 'scan.pdf'), '%PDF-1.4 test');

      const result = await anonymizeDocuments({ directory: inputDir, outputDir }, { now });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Successfully anonymized 2 of 3 files');
      expect(result.failures).toEqual([{
        file: path.join(inputDir, 'scan.pdf'),
        code: 'EXTRACTION_FAILED',
        message: `No suitable extractor available for ${path.join(inputDir, 'scan.pdf')}. Configure a connector or provide a markdown/text file.`,
      }]);
      expect((await readdir(path.join(outputDir, 'anonymized'))).sort()).toEqual(['letter.md', 'reply.md']);
    });

    it('should not load any input once the run is cancelled', async () => {
      await writeFile(path.join(inputDir, 'scan.pdf'), '%PDF-1.4 test');
      const { registry, calls } = recordingExtractors();
      const controller = new AbortController();
      controller.abort();

      const result = await anonymizeDocuments(
        { directory: inputDir, outputDir },
        { now, extractors: registry, signal: controller.signal }
      );

      expect(result.success).toBe(false);
      expect(result.message).toBe('Anonymization cancelled before any file was processed');
      expect(result.statistics).toEqual({ files_found: 3, files_failed: 0 });
      expect(calls).toEqual([]);
      await expect(readdir(outputDir)).rejects.toThrow();
    });

    it('should stop extracting between files when cancelled', async () => {
      await writeFile(path.join(inputDir, 'a.pdf'), '%PDF-1.4 first');
      await writeFile(path.join(inputDir, 'b.pdf'), '%PDF-1.4 second');
      const controller = new AbortController();
      const { registry, calls } = recordingExtractors(() => controller.abort());

      const result = await anonymizeDocuments(
        { directory: inputDir, outputDir },
        { now, extractors: registry, signal: controller.signal }
      );

      expect(calls).toEqual([path.join(inputDir, 'a.pdf')]);
      expect(result.success).toBe(false);
      expect(result.message).toBe('Anonymization cancelled before any file was processed');
    });

    it('should report when no files match', async () => {
      const result = await anonymizeDocuments({ directory: inputDir, outputDir, patterns: ['*.docx'] });

      expect(result).toEqual({
        success: false,
        outputPaths: [],
        statistics: {},
        message: 'No files found matching the specified patterns',
      });
    });

    it('should fail without writing a vault when every file fails', async () => {
      const result = await anonymizeDocuments({ directory: inputDir, outputDir }, {
        now,
        detector: {
          name: 'down',
          scan: async () => {
            throw new Error('connection refused');
          },
        },
      });

      expect(result.success).toBe(false);
      expect(result.message).toBe('No files could be anonymized');
      expect(result.failures).toHaveLength(2);
      await expect(readdir(outputDir)).rejects.toThrow();
    });

    it('should fail restoration when no vault can be found', async () => {
      const result = await restoreDocuments({ directory: inputDir, outputDir });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('VAULT_NOT_FOUND');
    });

    it('should reject invalid input', async () => {
      const result = await anonymizeDocuments({ directory: inputDir, outputDir, scoreThreshold: 2 });

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('INVALID_CONFIG');
    });
  });

  describe('extractDocument', () => {
    it('should convert a text file next to its source', async () => {
      const source = path.join(inputDir, 'notes.txt');
      await writeFile(source, 'plain notes');

      const result = await extractDocument({ filePath: source });

      expect(result.success).toBe(true);
      expect(result.outputPaths).toEqual([path.join(inputDir, 'notes.md')]);
      expect(result.statistics).toMatchObject({ extraction_method: 'text', pages: 1, output_characters: 11 });
      expect(await readFile(path.join(inputDir, 'notes.md'), 'utf-8')).toBe('plain notes');
    });

    it('should refuse to overwrite its input', async () => {
      const source = path.join(inputDir, 'notes.md');
      await writeFile(source, '# Notes');

      const result = await extractDocument({ filePath: source });

      expect(result.success).toBe(false);
      expect(result.message).toBe(`Extraction failed: Output path would overwrite the input: ${source}`);
    });

    it('should report a missing input', async () => {
      const result = await extractDocument({ filePath: path.join(inputDir, 'missing.pdf') });

      expect(result.error).toEqual({ code: 'INPUT_NOT_FOUND', message: `File not found: ${path.join(inputDir, 'missing.pdf')}` });
    });
  });

  describe('segmentDocument', () => {
    it('should write numbered segments with headers and a report', async () => {
      const source = path.join(inputDir, 'guide.md');
      await writeFile(source, ['# Title', 'intro line', '## A', 'aaaa', '## B', 'bbbb'].join('\n'));

      const result = await segmentDocument({ filePath: source, outputDir, minTokens: 4, maxTokens: 100 }, { now });

      expect(result.success).toBe(true);
      expect(result.outputPaths).toEqual([
        path.join(outputDir, 'segments', 'guide_001_of_003.md'),
        path.join(outputDir, 'segments', 'guide_002_of_003.md'),
        path.join(outputDir, 'segments', 'guide_003_of_003.md'),
      ]);
      expect(result.statistics).toEqual({ total_segments: 3, average_tokens: 3, min_tokens: 3, max_tokens: 5 });
      expect(await readFile(path.join(outputDir, 'segments', 'guide_002_of_003.md'), 'utf-8')).toBe([
        '<!-- Segment 2 of 3 -->',
        '<!-- Original file: guide.md -->',
        '<!-- Tokens: ~3 -->',
        '<!-- Lines: 3-4 -->',
        '',
        '## A',
        'aaaa',
        '',
      ].join('\n'));
      expect(await readFile(path.join(outputDir, 'SEGMENTATION_REPORT.md'), 'utf-8')).toContain('- Total segments: 3');
    });

    it('should refuse formats other than markdown and text', async () => {
      const result = await segmentDocument({ filePath: path.join(inputDir, 'doc.pdf'), outputDir });

      expect(result.message).toBe('Segmentation failed: Only markdown or text files can be segmented');
    });
  });

  describe('splitIntoPrompts', () => {
    const guide = ['# Guide', '## Install', 'Run it.', '## Q&A', 'Ask.'].join('\n');

    it('should write one file per prompt', async () => {
      const source = path.join(inputDir, 'guide.md');
      await writeFile(source, guide);

      const result = await splitIntoPrompts({ filePath: source, outputDir }, { now });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Successfully created 2 prompt files');
      expect(result.outputPaths).toEqual([
        path.join(outputDir, 'prompts', 'guide_001_Install.md'),
        path.join(outputDir, 'prompts', 'guide_002_QA.md'),
      ]);
      expect(await readFile(path.join(outputDir, 'prompts', 'guide_001_Install.md'), 'utf-8')).toBe([
        '<!-- Prompt 1 of 2 -->',
        '<!-- Original file: guide.md -->',
        '<!-- Heading: Install -->',
        '<!-- Level: H2 -->',
        '<!-- Parent: Guide -->',
        '',
        '# Guide',
        '',
        '## Install',
        '',
        'Run it.',
        '',
      ].join('\n'));
      expect(result.statistics).toEqual({
        total_prompts: 2,
        split_level: 'h2',
        average_length: 24,
        parent_context: true,
        template_used: false,
      });
    });

    it('should report a document without split headings', async () => {
      const source = path.join(inputDir, 'flat.md');
      await writeFile(source, 'no headings here');

      const result = await splitIntoPrompts({ filePath: source, outputDir, splitLevel: 'h3' });

      expect(result).toEqual({
        success: false,
        outputPaths: [],
        statistics: {},
        message: 'No h3 headings found in document',
      });
    });
  });
});

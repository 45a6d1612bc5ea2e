/**
 * docveil: Anonymization Pipeline Tests
 *
 * @module tests/anonymization-pipeline
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AnonymizationPipeline, drawDateOffset } from '../src/pipeline/anonymization-pipeline.js';
import { RestorationPipeline } from '../src/pipeline/restoration-pipeline.js';
import { createPipelineConfig, type RawDetection } from '../src/contracts/index.js';
import type { Detector, ScanOptions } from '../src/detection/index.js';
import type { RandomSource } from '../src/generation/index.js';
import { TelemetryEmitter } from '../src/telemetry/index.js';

/**
 * Detector that reports each known value wherever it occurs
 */
class DictionaryDetector implements Detector {
  readonly name = 'dictionary';
  readonly calls: string[] = [];

  constructor(private readonly entries: Array<[string, string, number?]>) {}

  async scan(text: string, _options?: ScanOptions): Promise<RawDetection[]> {
    this.calls.push(text);
    return this.entries
      .filter(([value]) => text.includes(value))
      .map(([value, entity_type, confidence]) => ({ entity_type, value, confidence: confidence ?? 0.9 }));
  }
}

class FailingDetector implements Detector {
  readonly name = 'failing';

  constructor(private readonly inner: Detector, private readonly failOn: string) {}

  async scan(text: string, options?: ScanOptions): Promise<RawDetection[]> {
    if (text.includes(this.failOn)) {
      throw new Error('service unavailable');
    }
    return this.inner.scan(text, options);
  }
}

function anonymizedText(outcome: { status: string } & Partial<{ text: string }>): string {
  if (outcome.status !== 'anonymized' || outcome.text === undefined) {
    throw new Error(`expected an anonymized outcome, got ${outcome.status}`);
  }
  return outcome.text;
}

describe('AnonymizationPipeline', () => {
  let telemetry: TelemetryEmitter;
  let detector: DictionaryDetector;

  beforeEach(() => {
    telemetry = new TelemetryEmitter();
    detector = new DictionaryDetector([
      ['John Smith', 'PERSON'],
      ['john@x.com', 'EMAIL_ADDRESS'],
    ]);
  });

  describe('Single file', () => {
    it('should replace every detected value and record both pairs', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed: 1 }), detector, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'Contact John Smith at john@x.com.' }]);

      const [file] = result.files;
      expect(file?.status).toBe('anonymized');
      const text = anonymizedText(file ?? { status: 'missing' });
      const person = result.mappings.get('John Smith');
      const email = result.mappings.get('john@x.com');

      expect(text).toBe(`Contact ${person} at ${email}.`);
      expect(text).not.toContain('John Smith');
      expect(text).not.toContain('john@x.com');
      expect(result.statistics).toEqual({ PERSON: 1, EMAIL_ADDRESS: 1 });
      expect(result.newMappings.size).toBe(2);
      expect(result.cancelled).toBe(false);
    });

    it('should count every occurrence of a repeated value', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed: 1 }), detector, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'John Smith, John Smith and John Smith.' }]);

      expect(result.statistics).toEqual({ PERSON: 3 });
      expect(result.mappings.size).toBe(1);
    });

    it('should leave text without detections unchanged', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), detector, telemetry);

      const result = await pipeline.run([{ id: 'plain.md', text: 'Nothing to see here.' }]);

      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toBe('Nothing to see here.');
      expect(result.statistics).toEqual({});
      expect(result.mappings.size).toBe(0);
    });
  });

  describe('Consistency', () => {
    it('should use one replacement per value across files', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed: 3 }), detector, telemetry);

      const result = await pipeline.run([
        { id: 'a.md', text: 'John Smith wrote this.' },
        { id: 'b.md', text: 'Reply to John Smith.' },
      ]);

      const person = result.mappings.get('John Smith');
      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toBe(`${person} wrote this.`);
      expect(anonymizedText(result.files[1] ?? { status: 'missing' })).toBe(`Reply to ${person}.`);
    });

    it('should reuse seed mappings without listing them as new', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), detector, telemetry);

      const result = await pipeline.run(
        [{ id: 'a.md', text: 'John Smith at john@x.com' }],
        { seedMappings: new Map([['John Smith', 'Pat Quinlan']]), dateOffset: 12 }
      );

      const email = result.mappings.get('john@x.com');
      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toBe(`Pat Quinlan at ${email}`);
      expect([...result.newMappings.keys()]).toEqual(['john@x.com']);
      expect(result.dateOffset).toBe(12);
    });

    it('should not let one batch see another batch\'s table', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), detector, telemetry);

      const first = await pipeline.run([{ id: 'a.md', text: 'John Smith' }]);
      const second = await pipeline.run([{ id: 'b.md', text: 'john@x.com' }]);

      expect([...first.mappings.keys()]).toEqual(['John Smith']);
      expect([...second.mappings.keys()]).toEqual(['john@x.com']);
      expect(first.batchId).not.toBe(second.batchId);
    });

    it('should give the first detected type to a value found as two types', async () => {
      const ambiguous = new DictionaryDetector([
        ['Jordan', 'PERSON'],
        ['Jordan', 'LOCATION'],
      ]);
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), ambiguous, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'Jordan went to Jordan.' }]);

      expect(result.statistics).toEqual({ PERSON: 2 });
    });
  });

  describe('Substrings', () => {
    it('should replace the longer of two overlapping values', async () => {
      const overlapping = new DictionaryDetector([
        ['Jon', 'PERSON'],
        ['Jones', 'PERSON'],
      ]);
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed: 9 }), overlapping, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'Jones and Jon' }]);

      const jones = result.mappings.get('Jones');
      const jon = result.mappings.get('Jon');
      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toBe(`${jones} and ${jon}`);
      expect(result.statistics).toEqual({ PERSON: 2 });
    });

    it('should not record a value that never occurs in the text', async () => {
      const phantom = new DictionaryDetector([['John Smith', 'PERSON']]);
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), {
        name: 'phantom',
        scan: async (text) => [
          ...(await phantom.scan(text)),
          { entity_type: 'PERSON', value: 'Nobody Here', confidence: 0.9 },
        ],
      }, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'John Smith' }]);

      expect([...result.mappings.keys()]).toEqual(['John Smith']);
    });
  });

  describe('Filtering', () => {
    it('should ignore detections below the score threshold', async () => {
      const lowConfidence = new DictionaryDetector([
        ['John Smith', 'PERSON', 0.3],
        ['john@x.com', 'EMAIL_ADDRESS', 0.95],
      ]);
      const pipeline = new AnonymizationPipeline(
        createPipelineConfig({ scoreThreshold: 0.5 }),
        lowConfidence,
        telemetry
      );

      const result = await pipeline.run([{ id: 'a.md', text: 'John Smith, john@x.com' }]);

      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toContain('John Smith');
      expect(result.statistics).toEqual({ EMAIL_ADDRESS: 1 });
    });

    it('should ignore types outside the allow-list', async () => {
      const pipeline = new AnonymizationPipeline(
        createPipelineConfig({ entityTypes: ['EMAIL_ADDRESS'] }),
        detector,
        telemetry
      );

      const result = await pipeline.run([{ id: 'a.md', text: 'John Smith, john@x.com' }]);

      expect([...result.mappings.keys()]).toEqual(['john@x.com']);
    });

    it('should send unrecognized labels to the fallback token', async () => {
      const custom = new DictionaryDetector([['ACME-7781', 'INTERNAL_CODE']]);
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), custom, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'Ref ACME-7781.' }]);

      expect(anonymizedText(result.files[0] ?? { status: 'missing' })).toBe('Ref REDACTED_UNKNOWN.');
      expect(result.statistics).toEqual({ UNKNOWN: 1 });
    });
  });

  describe('Failures', () => {
    it('should report a failed file and continue with the rest', async () => {
      const pipeline = new AnonymizationPipeline(
        createPipelineConfig(),
        new FailingDetector(detector, 'BROKEN'),
        telemetry
      );

      const result = await pipeline.run([
        { id: 'a.md', text: 'BROKEN John Smith' },
        { id: 'b.md', text: 'John Smith' },
      ]);

      expect(result.files[0]).toEqual({
        status: 'failed',
        id: 'a.md',
        error: {
          code: 'DETECTION_FAILED',
          message: 'Detector failing failed on a.md: service unavailable',
        },
      });
      expect(result.files[1]?.status).toBe('anonymized');
      expect(telemetry.getMetrics().files_failed).toBe(1);
    });

    it('should fail a file whose detector returns malformed output', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), {
        name: 'broken',
        scan: async () => [{ entity_type: 'PERSON', value: 'x', confidence: 7 }],
      }, telemetry);

      const result = await pipeline.run([{ id: 'a.md', text: 'x' }]);

      expect(result.files[0]?.status).toBe('failed');
    });

    it('should refuse a file that already holds placeholder characters', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), detector, telemetry);

      const result = await pipeline.run([
        { id: 'a.md', text: 'John Smith and \uE000PERSON_1\uE001' },
        { id: 'b.md', text: 'John Smith' },
      ]);

      expect(result.files[0]).toEqual({
        status: 'failed',
        id: 'a.md',
        error: {
          code: 'RESERVED_CHARACTERS',
          message: 'a.md contains the reserved characters U+E000 or U+E001 and cannot be anonymized',
        },
      });
      expect(detector.calls).toEqual(['John Smith']);
      expect(result.files[1]?.status).toBe('anonymized');
    });
  });

  describe('Cancellation', () => {
    it('should skip the remaining files once the signal aborts', async () => {
      const controller = new AbortController();
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), {
        name: 'aborting',
        scan: async (text, options) => {
          const found = await detector.scan(text, options);
          controller.abort();
          return found;
        },
      }, telemetry);

      const result = await pipeline.run(
        [
          { id: 'a.md', text: 'John Smith' },
          { id: 'b.md', text: 'john@x.com' },
        ],
        { signal: controller.signal }
      );

      expect(result.files.map(file => file.status)).toEqual(['anonymized', 'skipped']);
      expect(result.cancelled).toBe(true);
      expect([...result.mappings.keys()]).toEqual(['John Smith']);
    });
  });

  describe('Progress', () => {
    it('should report each file and completion', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig(), detector, telemetry);
      const messages: Array<[string, number]> = [];

      await pipeline.run(
        [{ id: 'a.md', text: 'x' }, { id: 'b.md', text: 'y' }],
        { onProgress: (message, progress) => messages.push([message, progress]) }
      );

      expect(messages).toEqual([
        ['Anonymizing a.md', 0],
        ['Anonymizing b.md', 0.5],
        ['Anonymization complete', 1],
      ]);
    });
  });

  describe('Round trip', () => {
    it('should restore the original text from the batch mappings', async () => {
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed: 5 }), detector, telemetry);
      const original = 'Contact John Smith at john@x.com. John Smith replies.';

      const result = await pipeline.run([{ id: 'a.md', text: original }]);
      const restorer = RestorationPipeline.fromMappings(result.mappings);

      expect(restorer.restoreText(anonymizedText(result.files[0] ?? { status: 'missing' }))).toEqual({
        text: original,
        replacements: 3,
      });
    });

    it.each([1, 2, 3])('should restore more locations than the city list holds (seed %i)', async (seed) => {
      const towns = Array.from({ length: 40 }, (_, i) => `Town${String(i).padStart(2, '0')}`);
      const places = new DictionaryDetector(towns.map((town): [string, string] => [town, 'LOCATION']));
      const pipeline = new AnonymizationPipeline(createPipelineConfig({ seed }), places, telemetry);
      const original = towns.map(town => `${town} 2 km away.`).join('\n');

      const result = await pipeline.run([{ id: 'towns.md', text: original }]);
      const restorer = RestorationPipeline.fromMappings(result.mappings);

      expect(result.mappings.size).toBe(40);
      expect(restorer.restoreText(anonymizedText(result.files[0] ?? { status: 'missing' }))).toEqual({
        text: original,
        replacements: 40,
      });
    });
  });
});

describe('drawDateOffset', () => {
  const fixed = (value: number): RandomSource => ({
    next: () => value,
    nextInt: (min, max) => Math.floor(value * (max - min)) + min,
    pick: (items) => {
      const first = items[0];
      if (first === undefined) throw new RangeError('empty');
      return first;
    },
  });

  it('should stay within the configured bound', () => {
    expect(drawDateOffset(fixed(0), 30)).toBe(-30);
    expect(drawDateOffset(fixed(0.9999), 30)).toBe(30);
  });

  it('should return zero when the bound is zero', () => {
    expect(drawDateOffset(fixed(0.5), 0)).toBe(0);
  });
});

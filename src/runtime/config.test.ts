/**
 * docveil: Runtime Configuration Tests
 *
 * @module runtime/config.test
 */

import { describe, it, expect } from 'vitest';
import { PatternDetector, PresidioDetector } from '@docveil/engine';
import {
  DEFAULTS,
  createDetector,
  describeConfig,
  extractionSettings,
  loadConfig,
  parseInteger,
  parseRatio,
  parseUrl,
} from './config.js';

describe('loadConfig', () => {
  it('should fall back to defaults on an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      logLevel: 'info',
      scoreThreshold: 0.5,
      dateShiftDays: 365,
      detector: 'pattern',
      presidioUrl: DEFAULTS.presidioUrl,
      azure: { endpoint: null, apiKey: null },
      llamaParseApiKey: null,
      doclingUrl: null,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.azure)).toBe(true);
  });

  it('should read every variable', () => {
    const config = loadConfig({
      LOG_LEVEL: 'WARN',
      DOCVEIL_SCORE_THRESHOLD: '0.75',
      DOCVEIL_DATE_SHIFT_DAYS: '30',
      PRESIDIO_URL: 'http://analyzer.test:5002',
      AZURE_DI_ENDPOINT: 'https://di.test/',
      AZURE_DI_KEY: ' test-secret ',
      LLAMAPARSE_API_KEY: 'test-secret',
      DOCLING_URL: 'http://docling.test',
    });

    expect(config).toEqual({
      logLevel: 'warn',
      scoreThreshold: 0.75,
      dateShiftDays: 30,
      detector: 'presidio',
      presidioUrl: 'http://analyzer.test:5002',
      azure: { endpoint: 'https://di.test/', apiKey: 'test-secret' },
      llamaParseApiKey: 'test-secret',
      doclingUrl: 'http://docling.test',
    });
  });

  it('should let DOCVEIL_DETECTOR override the Presidio URL', () => {
    expect(loadConfig({ PRESIDIO_URL: 'http://analyzer.test', DOCVEIL_DETECTOR: 'pattern' }).detector).toBe('pattern');
    expect(loadConfig({ DOCVEIL_DETECTOR: 'Presidio' }).detector).toBe('presidio');
    expect(loadConfig({ DOCVEIL_DETECTOR: 'spacy' }).detector).toBe('pattern');
  });

  it('should ignore unusable values', () => {
    const config = loadConfig({
      LOG_LEVEL: 'chatty',
      DOCVEIL_SCORE_THRESHOLD: 'high',
      DOCVEIL_DATE_SHIFT_DAYS: '-3',
      DOCLING_URL: 'not a url',
    });

    expect(config.logLevel).toBe('info');
    expect(config.scoreThreshold).toBe(0.5);
    expect(config.dateShiftDays).toBe(365);
    expect(config.doclingUrl).toBeNull();
  });
});

describe('parse helpers', () => {
  it('should parse integers', () => {
    expect(parseInteger(undefined, 7)).toBe(7);
    expect(parseInteger(' ', 7)).toBe(7);
    expect(parseInteger('12', 7)).toBe(12);
    expect(parseInteger('x', 7)).toBe(7);
  });

  it('should clamp ratios', () => {
    expect(parseRatio('1.7', 0.5)).toBe(1);
    expect(parseRatio('-0.2', 0.5)).toBe(0);
    expect(parseRatio('0.3', 0.5)).toBe(0.3);
  });

  it('should accept only absolute URLs', () => {
    expect(parseUrl('http://localhost:5001')).toBe('http://localhost:5001');
    expect(parseUrl('localhost')).toBeNull();
    expect(parseUrl('')).toBeNull();
  });
});

describe('collaborators', () => {
  it('should choose the detector', () => {
    expect(createDetector(loadConfig({}))).toBeInstanceOf(PatternDetector);
    expect(createDetector(loadConfig({ PRESIDIO_URL: 'http://analyzer.test' }))).toBeInstanceOf(PresidioDetector);
  });

  it('should configure only complete connectors', () => {
    expect(extractionSettings(loadConfig({ AZURE_DI_ENDPOINT: 'https://di.test/' }))).toEqual({});
    expect(extractionSettings(loadConfig({
      AZURE_DI_ENDPOINT: 'https://di.test/',
      AZURE_DI_KEY: 'test-secret',
      DOCLING_URL: 'http://docling.test',
    }))).toEqual({
      azure: { endpoint: 'https://di.test/', apiKey: 'test-secret' },
      docling: { url: 'http://docling.test' },
    });
  });

  it('should describe the configuration without secrets', () => {
    expect(describeConfig(loadConfig({ LLAMAPARSE_API_KEY: 'test-secret' }))).toEqual({
      detector: 'pattern',
      score_threshold: '0.5',
      date_shift_days: '365',
      azure: '(not set)',
      llamaparse: '(set)',
      docling: '(not set)',
    });
  });
});

/**
 * @fileoverview Runtime configuration for the docveil CLI
 * @module runtime/config
 *
 * Reads environment variables into a typed, frozen configuration and builds
 * the detector and extraction settings the document tools are given.
 */

import {
  DEFAULT_DATE_SHIFT_DAYS,
  DEFAULT_SCORE_THRESHOLD,
  PatternDetector,
  PresidioDetector,
  createLogger,
  parseLogLevel,
  type Detector,
  type ExtractionSettings,
  type LogLevel,
} from '@docveil/engine';

const logger = createLogger('config');

// =============================================================================
// Environment Variable Names
// =============================================================================

export const ENV_VARS = {
  LOG_LEVEL: 'LOG_LEVEL',
  /** Minimum detection confidence, 0..1 */
  SCORE_THRESHOLD: 'DOCVEIL_SCORE_THRESHOLD',
  /** Upper bound of the per-batch date offset, in days */
  DATE_SHIFT_DAYS: 'DOCVEIL_DATE_SHIFT_DAYS',
  /** `pattern` or `presidio` */
  DETECTOR: 'DOCVEIL_DETECTOR',
  PRESIDIO_URL: 'PRESIDIO_URL',
  AZURE_DI_ENDPOINT: 'AZURE_DI_ENDPOINT',
  AZURE_DI_KEY: 'AZURE_DI_KEY',
  LLAMAPARSE_API_KEY: 'LLAMAPARSE_API_KEY',
  DOCLING_URL: 'DOCLING_URL',
} as const;

// =============================================================================
// Default Values
// =============================================================================

export const DEFAULTS = {
  logLevel: 'info',
  scoreThreshold: DEFAULT_SCORE_THRESHOLD,
  dateShiftDays: DEFAULT_DATE_SHIFT_DAYS,
  presidioUrl: 'http://localhost:5002',
} as const satisfies {
  logLevel: LogLevel;
  scoreThreshold: number;
  dateShiftDays: number;
  presidioUrl: string;
};

// =============================================================================
// Types
// =============================================================================

export type DetectorKind = 'pattern' | 'presidio';

const DETECTOR_KINDS: readonly DetectorKind[] = ['pattern', 'presidio'];

export interface RuntimeConfig {
  readonly logLevel: LogLevel;
  readonly scoreThreshold: number;
  readonly dateShiftDays: number;
  readonly detector: DetectorKind;
  readonly presidioUrl: string;
  readonly azure: {
    readonly endpoint: string | null;
    readonly apiKey: string | null;
  };
  readonly llamaParseApiKey: string | null;
  readonly doclingUrl: string | null;
}

type Environment = Record<string, string | undefined>;

// =============================================================================
// Parse Helpers
// =============================================================================

/**
 * Parses an integer, falling back on missing, non-numeric or negative input
 */
export function parseInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

/**
 * Parses a ratio, clamped to 0..1
 */
export function parseRatio(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : Math.max(0, Math.min(1, parsed));
}

/**
 * Returns the URL, or null when unset or unparseable
 */
export function parseUrl(value: string | undefined): string | null {
  if (!value) {
    return null;
  }
  try {
    new URL(value);
    return value;
  } catch {
    logger.warn({ value }, 'Ignoring invalid URL');
    return null;
  }
}

function parseSecret(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseDetectorKind(value: string | undefined, presidioUrl: string | null): DetectorKind {
  const candidate = value?.trim().toLowerCase();
  const kind = DETECTOR_KINDS.find(k => k === candidate);
  if (kind) {
    return kind;
  }
  if (candidate) {
    logger.warn({ value }, 'Unknown detector, choosing from PRESIDIO_URL');
  }
  return presidioUrl ? 'presidio' : 'pattern';
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Loads the runtime configuration from environment variables
 */
export function loadConfig(env: Environment = process.env): RuntimeConfig {
  const presidioUrl = parseUrl(env[ENV_VARS.PRESIDIO_URL]);

  return Object.freeze({
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL], DEFAULTS.logLevel),
    scoreThreshold: parseRatio(env[ENV_VARS.SCORE_THRESHOLD], DEFAULTS.scoreThreshold),
    dateShiftDays: parseInteger(env[ENV_VARS.DATE_SHIFT_DAYS], DEFAULTS.dateShiftDays),
    detector: parseDetectorKind(env[ENV_VARS.DETECTOR], presidioUrl),
    presidioUrl: presidioUrl ?? DEFAULTS.presidioUrl,
    azure: Object.freeze({
      endpoint: parseUrl(env[ENV_VARS.AZURE_DI_ENDPOINT]),
      apiKey: parseSecret(env[ENV_VARS.AZURE_DI_KEY]),
    }),
    llamaParseApiKey: parseSecret(env[ENV_VARS.LLAMAPARSE_API_KEY]),
    doclingUrl: parseUrl(env[ENV_VARS.DOCLING_URL]),
  });
}

let cachedConfig: RuntimeConfig | null = null;

/**
 * Gets the runtime configuration (cached)
 */
export function getConfig(): RuntimeConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

// =============================================================================
// Collaborators
// =============================================================================

export function createDetector(config: RuntimeConfig): Detector {
  if (config.detector === 'presidio') {
    return new PresidioDetector({ url: config.presidioUrl });
  }
  return new PatternDetector();
}

/**
 * Connector settings; a connector missing its settings stays unavailable
 */
export function extractionSettings(config: RuntimeConfig): ExtractionSettings {
  const settings: ExtractionSettings = {};
  if (config.azure.endpoint && config.azure.apiKey) {
    settings.azure = { endpoint: config.azure.endpoint, apiKey: config.azure.apiKey };
  }
  if (config.llamaParseApiKey) {
    settings.llamaParse = { apiKey: config.llamaParseApiKey };
  }
  if (config.doclingUrl) {
    settings.docling = { url: config.doclingUrl };
  }
  return settings;
}

/**
 * Describes which collaborators the configuration enables
 */
export function describeConfig(config: RuntimeConfig): Record<string, string> {
  return {
    detector: config.detector === 'presidio' ? `presidio (${config.presidioUrl})` : 'pattern',
    score_threshold: String(config.scoreThreshold),
    date_shift_days: String(config.dateShiftDays),
    azure: config.azure.endpoint && config.azure.apiKey ? config.azure.endpoint : '(not set)',
    llamaparse: config.llamaParseApiKey ? '(set)' : '(not set)',
    docling: config.doclingUrl ?? '(not set)',
  };
}

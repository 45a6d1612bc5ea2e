/**
 * docveil: Error Taxonomy
 *
 * Every failure the engine surfaces is a {@link DocveilError} with a stable
 * code. Per-file failures (detection) are absorbed by the pipelines and
 * reported in the batch result; vault and persistence failures abort the
 * enclosing operation.
 *
 * @module errors
 */

export type ErrorCode =
  | 'DETECTION_FAILED'
  | 'RESERVED_CHARACTERS'
  | 'INPUT_NOT_FOUND'
  | 'VAULT_NOT_FOUND'
  | 'VAULT_FORMAT'
  | 'PERSISTENCE_FAILED'
  | 'EXTRACTION_FAILED'
  | 'SEGMENTATION_FAILED'
  | 'INVALID_CONFIG'
  | 'INTERNAL_ERROR';

/**
 * Serializable error shape used in results and CLI output
 */
export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: unknown;
}

export class DocveilError extends Error {
  /**
   * @param code - Error code
   * @param message - Error message
   * @param retryable - Whether repeating the operation may succeed
   * @param details - Additional error details
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DocveilError';
  }

  toJSON(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/**
 * The detector failed on one document
 */
export class DetectionError extends DocveilError {
  constructor(public readonly fileId: string, message: string, options?: ErrorOptions) {
    super('DETECTION_FAILED', message, true, { fileId }, options);
    this.name = 'DetectionError';
  }
}

/**
 * A document contains the private-use code points that frame placeholders
 */
export class ReservedCharacterError extends DocveilError {
  constructor(public readonly fileId: string) {
    super(
      'RESERVED_CHARACTERS',
      `${fileId} contains the reserved characters U+E000 or U+E001 and cannot be anonymized`,
      false,
      { fileId }
    );
    this.name = 'ReservedCharacterError';
  }
}

/**
 * An input file or directory named by the caller does not exist
 */
export class InputNotFoundError extends DocveilError {
  constructor(public readonly inputPath: string, kind: 'File' | 'Directory' = 'File') {
    super('INPUT_NOT_FOUND', `${kind} not found: ${inputPath}`, false, { inputPath });
    this.name = 'InputNotFoundError';
  }
}

export class VaultNotFoundError extends DocveilError {
  constructor(public readonly vaultPath: string) {
    super('VAULT_NOT_FOUND', `Vault file not found: ${vaultPath}`, false, { vaultPath });
    this.name = 'VaultNotFoundError';
  }
}

export class VaultFormatError extends DocveilError {
  constructor(public readonly vaultPath: string, reason: string, options?: ErrorOptions) {
    super('VAULT_FORMAT', `Vault file ${vaultPath} is unusable: ${reason}`, false, { vaultPath }, options);
    this.name = 'VaultFormatError';
  }
}

/**
 * An I/O fault while writing a vault, report or output document
 */
export class PersistenceError extends DocveilError {
  constructor(public readonly targetPath: string, message: string, options?: ErrorOptions) {
    super('PERSISTENCE_FAILED', message, true, { targetPath }, options);
    this.name = 'PersistenceError';
  }
}

export class ExtractionError extends DocveilError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super('EXTRACTION_FAILED', message, false, details, options);
    this.name = 'ExtractionError';
  }
}

export class SegmentationError extends DocveilError {
  constructor(message: string, details?: unknown) {
    super('SEGMENTATION_FAILED', message, false, details);
    this.name = 'SegmentationError';
  }
}

export class ConfigurationError extends DocveilError {
  constructor(message: string, details?: unknown) {
    super('INVALID_CONFIG', message, false, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize any thrown value to {@link ErrorInfo}
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof DocveilError) {
    return error.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: errorMessage(error),
    retryable: false,
  };
}

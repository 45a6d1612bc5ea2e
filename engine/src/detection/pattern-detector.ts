/**
 * docveil: Pattern Detector
 *
 * Local, regex-based detector with optional validators and keyword context.
 * It covers structured identifiers well; names, organizations and places are
 * only found in narrow forms (honorifics, legal suffixes), so a Presidio
 * deployment is the better source for prose-heavy documents.
 *
 * @module detection/pattern-detector
 */

import type { EntityType, RawDetection } from '../contracts/index.js';
import type { Detector, ScanOptions } from './detector.js';

/**
 * Pattern configuration
 */
export interface DetectionPattern {
  type: EntityType;
  /** Must carry the `g` flag */
  regex: RegExp;
  /** Base confidence score (0-1) */
  baseConfidence: number;
  validator?: (value: string) => boolean;
  /** Keywords near the match that raise confidence */
  contextKeywords?: string[];
  /** Confidence multiplier applied when no context keyword is present */
  missingContextFactor?: number;
}

export interface PatternDetectorConfig {
  /** Characters inspected on each side of a match */
  contextWindow?: number;
  enableValidation?: boolean;
  customPatterns?: DetectionPattern[];
}

interface PatternMatch {
  type: EntityType;
  start: number;
  end: number;
  value: string;
  confidence: number;
}

const CONTEXT_BOOST = 0.1;

export class PatternDetector implements Detector {
  readonly name = 'pattern';

  private readonly patterns: DetectionPattern[];
  private readonly contextWindow: number;
  private readonly enableValidation: boolean;

  constructor(config: PatternDetectorConfig = {}) {
    this.contextWindow = config.contextWindow ?? 50;
    this.enableValidation = config.enableValidation ?? true;
    this.patterns = [...buildDefaultPatterns(), ...(config.customPatterns ?? [])];
  }

  async scan(text: string, options: ScanOptions = {}): Promise<RawDetection[]> {
    options.signal?.throwIfAborted();

    const allowed = options.entityTypes ? new Set(options.entityTypes) : null;
    const matches: PatternMatch[] = [];
    for (const pattern of this.patterns) {
      if (allowed && !allowed.has(pattern.type)) continue;
      matches.push(...this.matchPattern(text, pattern));
    }

    matches.sort((a, b) => a.start - b.start || b.end - a.end);
    return removeOverlappingMatches(matches).map(match => ({
      entity_type: match.type,
      value: match.value,
      confidence: match.confidence,
    }));
  }

  private matchPattern(text: string, pattern: DetectionPattern): PatternMatch[] {
    const matches: PatternMatch[] = [];
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
      const value = match[0];
      if (value.length === 0) {
        regex.lastIndex++;
        continue;
      }
      if (this.enableValidation && pattern.validator && !pattern.validator(value)) {
        continue;
      }

      const start = match.index;
      const end = start + value.length;
      matches.push({
        type: pattern.type,
        start,
        end,
        value,
        confidence: this.adjustConfidence(pattern, text, start, end),
      });
    }

    return matches;
  }

  private adjustConfidence(pattern: DetectionPattern, text: string, start: number, end: number): number {
    if (!pattern.contextKeywords) {
      return pattern.baseConfidence;
    }

    const context = text
      .slice(Math.max(0, start - this.contextWindow), Math.min(text.length, end + this.contextWindow))
      .toLowerCase();

    if (pattern.contextKeywords.some(keyword => context.includes(keyword))) {
      return Math.min(1, pattern.baseConfidence + CONTEXT_BOOST);
    }
    return pattern.baseConfidence * (pattern.missingContextFactor ?? 1);
  }
}

/**
 * Drop overlapping matches, keeping the one with the higher confidence.
 * Input must be sorted by start offset.
 */
function removeOverlappingMatches(matches: PatternMatch[]): PatternMatch[] {
  const result: PatternMatch[] = [];
  let last: PatternMatch | null = null;

  for (const current of matches) {
    if (!last || current.start >= last.end) {
      if (last) result.push(last);
      last = current;
    } else if (current.confidence > last.confidence) {
      last = current;
    }
  }
  if (last) result.push(last);

  return result;
}

function buildDefaultPatterns(): DetectionPattern[] {
  return [
    {
      type: 'EMAIL_ADDRESS',
      regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
      baseConfidence: 0.95,
    },
    {
      type: 'US_SSN',
      regex: /\b(?!000|666|9\d{2})\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b/g,
      baseConfidence: 0.9,
      validator: validateSSN,
      contextKeywords: ['ssn', 'social security'],
    },
    {
      type: 'CREDIT_CARD',
      regex: /\b(?:\d{4}[-\s]?){3}\d{4}\b/g,
      baseConfidence: 0.9,
      validator: validateLuhn,
      contextKeywords: ['card', 'credit', 'debit', 'visa', 'mastercard', 'amex'],
    },
    {
      type: 'PHONE_NUMBER',
      regex: /(?:\+\d{1,3}[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s])\d{3}[-.\s]\d{4}\b/g,
      baseConfidence: 0.8,
      validator: validatePhone,
      contextKeywords: ['phone', 'call', 'mobile', 'telephone', 'tel', 'fax'],
    },
    {
      type: 'IP_ADDRESS',
      regex: /\b(?:(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.){3}(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\b/g,
      baseConfidence: 0.85,
    },
    {
      type: 'URL',
      regex: /\bhttps?:\/\/[^\s<>()"'\]]*[^\s<>()"'\].,;:!?]/g,
      baseConfidence: 0.85,
    },
    {
      type: 'DATE_TIME',
      regex: /\b(?:(?:0?[1-9]|1[0-2])[/-](?:0?[1-9]|[12]\d|3[01])[/-](?:19|20)\d{2}|(?:19|20)\d{2}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01]))\b/g,
      baseConfidence: 0.75,
      contextKeywords: ['dob', 'birth', 'born', 'date', 'admitted', 'signed'],
      missingContextFactor: 0.8,
    },
    {
      type: 'CRYPTO',
      regex: /\b0x[a-fA-F0-9]{40}\b/g,
      baseConfidence: 0.9,
    },
    {
      type: 'CRYPTO',
      regex: /\b(?:bc1[a-z0-9]{25,39}|[13][a-km-zA-HJ-NP-Z1-9]{25,34})\b/g,
      baseConfidence: 0.6,
      contextKeywords: ['bitcoin', 'btc', 'wallet'],
      missingContextFactor: 0.7,
    },
    {
      type: 'BANK_NUMBER',
      regex: /\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/g,
      baseConfidence: 0.85,
      validator: validateIBAN,
      contextKeywords: ['iban', 'account', 'bank'],
    },
    {
      type: 'PASSPORT',
      regex: /\b[A-Z]{1,2}\d{6,9}\b/g,
      baseConfidence: 0.7,
      contextKeywords: ['passport', 'travel document'],
      missingContextFactor: 0.6,
    },
    {
      type: 'MEDICAL_LICENSE',
      regex: /\b[A-Z]{2}-?\d{6,7}\b/g,
      baseConfidence: 0.6,
      contextKeywords: ['medical license', 'license no', 'npi', 'physician'],
      missingContextFactor: 0.5,
    },
    {
      type: 'PERSON',
      regex: /(?<=\b(?:Mr|Mrs|Ms|Dr|Prof)\.?\s)[A-Z][a-z]+(?:\s[A-Z][a-z]+)*/g,
      baseConfidence: 0.85,
    },
    {
      type: 'ORGANIZATION',
      regex: /\b[A-Z][A-Za-z&]*(?:\s[A-Z][A-Za-z&]*)*\s(?:Inc|LLC|Ltd|Corp|GmbH|Corporation)\b/g,
      baseConfidence: 0.75,
    },
  ];
}

function validateSSN(ssn: string): boolean {
  const digits = ssn.replace(/\D/g, '');
  return !/^(\d)\1{8}$/.test(digits) && digits !== '123456789';
}

/**
 * Luhn check over the digits of a card number
 */
function validateLuhn(cardNumber: string): boolean {
  const digits = cardNumber.replace(/\D/g, '');
  if (digits.length < 13 || digits.length > 19) {
    return false;
  }

  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits.charAt(digits.length - 1 - i));
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

function validatePhone(phone: string): boolean {
  const digits = phone.replace(/\D/g, '');
  return digits.length >= 10 && digits.length <= 15;
}

/**
 * ISO 13616 mod-97 check
 */
function validateIBAN(iban: string): boolean {
  if (iban.length < 15 || iban.length > 34) {
    return false;
  }
  const rearranged = `${iban.slice(4)}${iban.slice(0, 4)}`;
  let remainder = 0;
  for (const char of rearranged) {
    const code = char.charCodeAt(0);
    const value = code >= 65 ? String(code - 55) : char;
    for (const digit of value) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder === 1;
}

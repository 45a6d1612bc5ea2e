/**
 * docveil: Replacement Generator
 *
 * Maps an (entity type, original value) pair to a synthetic value and records
 * the pair in the caller's session table. A value already in the table is
 * never regenerated, which is what keeps replacements consistent across every
 * file of a batch.
 *
 * The table is keyed by original value only. A string first seen as PERSON
 * and later detected as ORGANIZATION keeps its PERSON replacement.
 *
 * @module generation/replacement-generator
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EntityType, SessionTable } from '../contracts/index.js';
import { DocveilError } from '../errors/index.js';
import { createLogger, getTelemetry, type TelemetryEmitter } from '../telemetry/index.js';
import type { RandomSource } from './random.js';

const WordListsSchema = z.object({
  firstNames: z.array(z.string().min(1)).nonempty(),
  lastNames: z.array(z.string().min(1)).nonempty(),
  cities: z.array(z.string().min(1)).nonempty(),
  cityPrefixes: z.array(z.string().min(1)).nonempty(),
  citySuffixes: z.array(z.string().min(1)).nonempty(),
  syllables: z.array(z.string().min(1)).nonempty(),
  companyNames: z.array(z.string().min(1)).nonempty(),
  companySuffixes: z.array(z.string().min(1)).nonempty(),
  emailDomains: z.array(z.string().min(1)).nonempty(),
});

const logger = createLogger('replacement-generator');

type WordLists = z.infer<typeof WordListsSchema>;

const WORD_LISTS: WordLists = WordListsSchema.parse(
  JSON.parse(readFileSync(new URL('../../data/synthetic-values.json', import.meta.url), 'utf-8'))
);

/** Draws from the type's own generator before switching to invented names */
const MAX_FRESH_ATTEMPTS = 25;

/** Draws of invented names before giving up on a distinct value */
const MAX_INVENTED_ATTEMPTS = 100;

const DOCUMENTATION_NETWORKS = ['192.0.2', '198.51.100', '203.0.113'] as const;

const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const HEX = '0123456789abcdef';

type ValueGenerator = (random: RandomSource) => string;

function digits(random: RandomSource, count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) {
    out += String(random.nextInt(0, 10));
  }
  return out;
}

function characters(random: RandomSource, alphabet: string, count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) {
    out += alphabet.charAt(random.nextInt(0, alphabet.length));
  }
  return out;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Three random syllables, e.g. `Korvalen`
 */
function inventedWord(random: RandomSource): string {
  return capitalize(`${random.pick(WORD_LISTS.syllables)}${random.pick(WORD_LISTS.syllables)}${random.pick(WORD_LISTS.syllables)}`);
}

function location(random: RandomSource): string {
  switch (random.nextInt(0, 3)) {
    case 0:
      return random.pick(WORD_LISTS.cities);
    case 1:
      return `${random.pick(WORD_LISTS.lastNames)}${random.pick(WORD_LISTS.citySuffixes)}`;
    default:
      return `${random.pick(WORD_LISTS.cityPrefixes)} ${random.pick(WORD_LISTS.lastNames)}${random.pick(WORD_LISTS.citySuffixes)}`;
  }
}

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '');
}

/**
 * Luhn check digit for a digit string
 */
export function luhnCheckDigit(payload: string): number {
  let sum = 0;
  for (let i = 0; i < payload.length; i++) {
    let digit = Number(payload.charAt(payload.length - 1 - i));
    if (i % 2 === 0) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return (10 - (sum % 10)) % 10;
}

const GENERATORS: Partial<Record<EntityType, ValueGenerator>> = {
  PERSON: (r) => `${r.pick(WORD_LISTS.firstNames)} ${r.pick(WORD_LISTS.lastNames)}`,
  ORGANIZATION: (r) => `${r.pick(WORD_LISTS.companyNames)} ${r.pick(WORD_LISTS.companySuffixes)}`,
  LOCATION: location,
  EMAIL_ADDRESS: (r) => {
    const first = slug(r.pick(WORD_LISTS.firstNames));
    const last = slug(r.pick(WORD_LISTS.lastNames));
    return `${first}.${last}${r.nextInt(10, 100)}@${r.pick(WORD_LISTS.emailDomains)}`;
  },
  PHONE_NUMBER: (r) => `(555) ${r.nextInt(200, 1000)}-${digits(r, 4)}`,
  CREDIT_CARD: (r) => {
    const payload = `4000${digits(r, 11)}`;
    return `${payload}${luhnCheckDigit(payload)}`;
  },
  US_SSN: (r) => `${r.nextInt(900, 1000)}-${String(r.nextInt(1, 100)).padStart(2, '0')}-${String(r.nextInt(1, 10000)).padStart(4, '0')}`,
  PASSPORT: (r) => `${characters(r, UPPER, 2)}${digits(r, 7)}`,
  DRIVER_LICENSE: (r) => `DL-${digits(r, 8)}`,
  IP_ADDRESS: (r) => `${r.pick(DOCUMENTATION_NETWORKS)}.${r.nextInt(1, 255)}`,
  DATE_TIME: (r) => {
    const from = Date.UTC(1970, 0, 1);
    const to = Date.UTC(2030, 0, 1);
    return new Date(from + Math.floor(r.next() * (to - from))).toISOString().slice(0, 19);
  },
  URL: (r) => `https://www.${slug(r.pick(WORD_LISTS.companyNames))}-${slug(r.pick(WORD_LISTS.lastNames))}.example/`,
  BANK_NUMBER: (r) => `${characters(r, UPPER, 4)}${digits(r, 14)}`,
  CRYPTO: (r) => `0x${characters(r, HEX, 40)}`,
  MEDICAL_LICENSE: (r) => `MD-${digits(r, 7)}`,
};

/**
 * Deterministic token for types without a dedicated generator
 */
export function fallbackToken(entityType: EntityType): string {
  return `REDACTED_${entityType}`;
}

export function hasDedicatedGenerator(entityType: EntityType): boolean {
  return GENERATORS[entityType] !== undefined;
}

export class ReplacementGenerator {
  private readonly random: RandomSource;
  private readonly telemetry: TelemetryEmitter;

  constructor(random: RandomSource, telemetry: TelemetryEmitter = getTelemetry()) {
    this.random = random;
    this.telemetry = telemetry;
  }

  /**
   * Synthetic value for `originalValue`, inserting it into `table` when new
   *
   * @throws RangeError when `originalValue` is empty
   * @throws DocveilError when no distinct synthetic value can be found
   */
  generate(entityType: EntityType, originalValue: string, table: SessionTable): string {
    if (originalValue.length === 0) {
      throw new RangeError('Cannot generate a replacement for an empty value');
    }

    const cached = table.get(originalValue);
    if (cached !== undefined) {
      return cached;
    }

    const generator = GENERATORS[entityType];
    let synthetic: string;
    if (generator) {
      synthetic = this.freshValue(entityType, generator, originalValue, table);
    } else {
      this.telemetry.recordGenerationFallback(entityType);
      synthetic = fallbackToken(entityType);
    }

    table.set(originalValue, synthetic);
    return synthetic;
  }

  /**
   * A value that is not an original in the table and neither contains nor is
   * contained in any synthetic value already handed out
   *
   * @throws DocveilError when no such value turns up
   */
  private freshValue(
    entityType: EntityType,
    generator: ValueGenerator,
    originalValue: string,
    table: SessionTable
  ): string {
    const taken = [...new Set(table.values())];
    const isFree = (candidate: string): boolean =>
      candidate !== originalValue &&
      !table.has(candidate) &&
      taken.every(used => !used.includes(candidate) && !candidate.includes(used));

    for (let attempt = 0; attempt < MAX_FRESH_ATTEMPTS; attempt++) {
      const candidate = generator(this.random);
      if (isFree(candidate)) return candidate;
    }

    for (let attempt = 0; attempt < MAX_INVENTED_ATTEMPTS; attempt++) {
      const candidate = `${inventedWord(this.random)} ${inventedWord(this.random)}`;
      if (isFree(candidate)) {
        logger.debug({ entityType }, 'Generator space exhausted, using an invented name');
        return candidate;
      }
    }

    throw new DocveilError('INTERNAL_ERROR', `Could not generate a distinct ${entityType} replacement`);
  }
}

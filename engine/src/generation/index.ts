export { Xorshift128Plus, createRandom, drawSeed } from './random.js';
export type { RandomSource } from './random.js';
export {
  ReplacementGenerator,
  fallbackToken,
  hasDedicatedGenerator,
  luhnCheckDigit,
} from './replacement-generator.js';

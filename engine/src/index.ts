/**
 * docveil engine
 *
 * Reversible document anonymization: detection, consistent synthetic
 * replacement, the mapping vault, restoration, document extraction,
 * segmentation and the document tools built on them.
 *
 * @packageDocumentation
 */

export * from './contracts/index.js';
export * from './errors/index.js';
export * from './telemetry/index.js';
export * from './detection/index.js';
export * from './generation/index.js';
export * from './vault/index.js';
export * from './pipeline/index.js';
export * from './extraction/index.js';
export * from './segmentation/index.js';
export * from './tools/index.js';

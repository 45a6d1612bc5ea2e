export { normalizeDetections } from './detector.js';
export type { Detector, ScanOptions } from './detector.js';
export { PatternDetector } from './pattern-detector.js';
export type { DetectionPattern, PatternDetectorConfig } from './pattern-detector.js';
export { PresidioDetector } from './presidio-detector.js';
export type { PresidioDetectorConfig, PresidioFinding } from './presidio-detector.js';

/**
 * PATTERNS MODULE — Index
 */

export * from './contracts/pattern.types.js';
export { PATTERN_POLICY } from './pattern.policy.js';
export { PatternDetector } from './services/pattern.detector.js';
export type { PatternDetectorOptions } from './services/pattern.detector.js';
export { PATTERN_SCANS } from './services/pattern.scans.js';
export { registerPatternRoutes } from './routes/pattern.routes.js';
export type { PatternQueries } from './routes/pattern.routes.js';

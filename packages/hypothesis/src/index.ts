/**
 * @syslang/hypothesis - Falsifiable hypotheses from declared principles
 */
export { synthesize, synthesizeOne, fallbackHypothesis } from './synthesizer.js';
export { CURATED_METRICS, curatedMetric, type CuratedMetric } from './metrics.js';

/**
 * Enrichment: tier thresholds and the highlight classifier.
 */

export { selectThreshold, isHighlight, SCORE_EPSILON } from './thresholds.js'
export type { SelectedThreshold, ThresholdBasis } from './thresholds.js'
export { runClassifier } from './classifier.js'
export type { ClassifierDeps, ClassifyOptions, ClassifyRunSummary } from './classifier.js'

/**
 * Change Detection Module
 */

export { CurrentSlice } from './current-slice.js';
export { DeltaClassifier, classify, countOutcomes } from './delta-classifier.js';
export type { ClassifyOptions } from './delta-classifier.js';

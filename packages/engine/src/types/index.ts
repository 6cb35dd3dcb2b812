export * from './classification.js';
export * from './summary.js';
export * from './audit.js';

export type { RunReporter } from './run-reporter.js';

/**
 * Reporters Module - Exports
 *
 * @license Apache-2.0
 */

export { BaseReporter } from './reporter-interface.js';
export type { Reporter } from './reporter-interface.js';
export { TextReporter } from './text-reporter.js';
export { JsonReporter } from './json-reporter.js';
export { NdjsonReporter } from './ndjson-reporter.js';
export { GitHubReporter, escapeCommandData } from './github-reporter.js';

/**
 * Analysis exports.
 */
export { analyse, CONFIG_SOURCE, type AnalyseOptions } from './engine.js';
export { resolveRoot } from './root.js';

/**
 * Plug-in registry exports.
 */
export * from './types.js';
export * from './plugin-registry.js';

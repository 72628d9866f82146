/**
 * Built-in aggregators.
 */
export * from './presence.js';
export * from './citation.js';
export * from './code.js';
export * from './community.js';
export * from './documentation.js';
export * from './license.js';
export * from './packaging.js';
export * from './version-control.js';

/**
 * Built-in analysers.
 */
export * from './citation.js';
export * from './code-jupyter.js';
export * from './code-python.js';
export * from './community.js';
export * from './dependency-python.js';
export * from './git.js';
export * from './license.js';
export * from './packaging-python.js';
export * from './readme.js';

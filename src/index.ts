/**
 * repoaudit: repository scanner.
 * Main library exports barrel file.
 */
import './analysers/register.js';
import './aggregators/register.js';

// Engine
export * from './core/rules/index.js';
export * from './core/registry/index.js';
export * from './core/metadata/index.js';
export * from './core/report/index.js';
export * from './core/scanner/index.js';
export * from './core/analysis/index.js';
export * from './core/config/index.js';

// Built-in plug-ins
export * from './analysers/index.js';
export * from './aggregators/index.js';

// Utilities
export * from './utils/index.js';
export { VERSION } from './version.js';

// CLI
export { createCli } from './cli/index.js';

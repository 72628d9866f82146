/**
 * Scanner barrel file.
 */
export { scan, throwIfAborted } from './walker.js';
export type { ScanOptions, ScanResult, ScanStats } from './types.js';

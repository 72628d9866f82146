/**
 * Metadata barrel file.
 */
export {
  MetadataStore,
  cleanMetadataValue,
  isEmptyMetadata,
  formatMetadataValue,
} from './store.js';
export { validateMetadataValue } from './validators.js';
export type * from './types.js';

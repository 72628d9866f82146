/**
 * Aggregator registration module.
 * Registers all built-in aggregators with the plug-in registry.
 */
import { pluginRegistry } from '../core/registry/plugin-registry.js';
import { CitationAggregator } from './citation.js';
import { CodeAggregator } from './code.js';
import { CommunityAggregator } from './community.js';
import { DocumentationAggregator } from './documentation.js';
import { LicenseAggregator } from './license.js';
import { PackagingAggregator } from './packaging.js';
import { VersionControlAggregator } from './version-control.js';

pluginRegistry.registerAggregator('License', () => new LicenseAggregator());
pluginRegistry.registerAggregator('Citation', () => new CitationAggregator());
pluginRegistry.registerAggregator('VersionControl', () => new VersionControlAggregator());
pluginRegistry.registerAggregator('Documentation', () => new DocumentationAggregator());
pluginRegistry.registerAggregator('Packaging', () => new PackagingAggregator());
pluginRegistry.registerAggregator('Community', () => new CommunityAggregator());
pluginRegistry.registerAggregator('Code', () => new CodeAggregator());

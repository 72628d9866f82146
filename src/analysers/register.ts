/**
 * Analyser registration module.
 * Registers all built-in analysers with the plug-in registry.
 * Import this module to ensure analysers are available before a scan.
 */
import { pluginRegistry } from '../core/registry/plugin-registry.js';
import { CitationAnalyser } from './citation.js';
import { CodeJupyterAnalyser } from './code-jupyter.js';
import { CodePythonAnalyser } from './code-python.js';
import { CommunityAnalyser } from './community.js';
import { DependencyPythonAnalyser } from './dependency-python.js';
import { GitAnalyser } from './git.js';
import { LicenseAnalyser } from './license.js';
import { PackagingPythonAnalyser } from './packaging-python.js';
import { ReadmeAnalyser } from './readme.js';

pluginRegistry.registerAnalyser('License', () => new LicenseAnalyser());
pluginRegistry.registerAnalyser('Citation', () => new CitationAnalyser());
pluginRegistry.registerAnalyser('Git', () => new GitAnalyser());
pluginRegistry.registerAnalyser('PackagingPython', () => new PackagingPythonAnalyser());
pluginRegistry.registerAnalyser('DependencyPython', () => new DependencyPythonAnalyser());
pluginRegistry.registerAnalyser('CodePython', () => new CodePythonAnalyser());
pluginRegistry.registerAnalyser('CodeJupyter', () => new CodeJupyterAnalyser());
pluginRegistry.registerAnalyser('Community', () => new CommunityAnalyser());
pluginRegistry.registerAnalyser('Readme', () => new ReadmeAnalyser());

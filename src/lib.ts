/**
 * Construct Atlas - Library Entry Point
 *
 * Exports the knowledge base core for use by any presentation layer.
 * This file should NOT import the CLI or terminal styling packages.
 */

// Loader and model
export { KnowledgeBaseLoader, defaultCandidatePaths, parseKnowledgeBase } from './kb/loader.js';
export { KnowledgeBase, openKnowledgeBase } from './kb/model.js';
export { resolveStrength } from './kb/strength.js';

// Overlap advisor
export * from './advisor/index.js';

// Views and export
export * from './views/index.js';
export { modelTableToCsv, parseModelTableCsv, dimensionLabel } from './export/csv.js';
export { AtlasSession } from './session/atlasSession.js';
export type { SessionView } from './session/atlasSession.js';

// Configuration
export { resolveConfig } from './config.js';
export type { AtlasConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';

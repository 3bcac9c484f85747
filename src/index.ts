/**
 * Main entry point for fossa-pipeline-tools
 * Exports public API
 */

export * from './features/teams/index.js';
export * from './features/analysis/index.js';
export * from './features/ignore-rules/index.js';
export * from './platform/index.js';
export * from './shared/config/schemas.js';
export * from './shared/config/ConfigLoader.js';
export * from './shared/utils/apiClient.js';
export * from './shared/utils/logger.js';
export * from './shared/utils/errors.js';

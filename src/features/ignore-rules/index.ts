/**
 * Ignore rules feature - paginated export of FOSSA exceptions
 */

export { createExportIgnoresCommand, runExportIgnoresCommand } from './commands/exportIgnores.js';
export {
  exportIgnoreRules,
  fetchAllIgnoreRules,
  defaultOutFile,
  DEFAULT_PAGE_SIZE,
  type ExportIgnoreRulesOptions,
  type FetchIgnoreRulesOptions,
  type ExportResult,
} from './IgnoreRulesExporter.js';
export {
  formatCsv,
  formatJson,
  formatRules,
  flattenRecord,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './formatters.js';

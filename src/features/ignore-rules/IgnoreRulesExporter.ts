/**
 * Ignore-rules export
 *
 * Walks the exceptions API page by page (page = 1, 2, ...) and stops at the
 * first page holding fewer than `count` entries. Any rejected page is fatal:
 * there is no partial export.
 */

import path from 'path';
import type { IFossaAPIClient } from '../teams/api/IFossaAPIClient.js';
import type { IgnoreRule, IgnoreRuleCategory } from '../teams/api/types.js';
import type { IFileSystem } from '../../platform/IFileSystem.js';
import { ConfigurationError } from '../../shared/utils/errors.js';
import type { Logger } from '../../shared/utils/logger.js';
import { type OutputFormat, formatRules } from './formatters.js';

export const DEFAULT_PAGE_SIZE = 1000;

export interface FetchIgnoreRulesOptions {
  category: IgnoreRuleCategory;
  count: number;
  /**
   * Called after each page with the page number and the running total
   */
  onPage?: (page: number, total: number) => void;
}

export interface ExportIgnoreRulesOptions extends FetchIgnoreRulesOptions {
  format: OutputFormat;
  /**
   * Output file. Defaults to paginated_results.<format> in the working directory.
   */
  outFile?: string;
}

export interface ExportResult {
  count: number;
  path: string;
}

export function defaultOutFile(format: OutputFormat): string {
  return `paginated_results.${format}`;
}

export async function fetchAllIgnoreRules(
  client: IFossaAPIClient,
  options: FetchIgnoreRulesOptions,
  logger: Logger
): Promise<IgnoreRule[]> {
  const { category, count } = options;
  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigurationError(`Page size must be a positive integer (got ${count})`);
  }

  const results: IgnoreRule[] = [];
  let page = 1;

  for (;;) {
    const { rules, received } = await client.ignoreRules.listPage({ category, page, count });
    results.push(...rules);
    logger.debug(`Fetched page ${page}: ${rules.length} ${category} rules`);
    if (rules.length < received) {
      logger.warn(`Skipped ${received - rules.length} malformed entries on page ${page}`);
    }
    options.onPage?.(page, results.length);

    if (received < count) {
      break;
    }
    page += 1;
  }

  return results;
}

export async function exportIgnoreRules(
  client: IFossaAPIClient,
  fs: IFileSystem,
  options: ExportIgnoreRulesOptions,
  logger: Logger
): Promise<ExportResult> {
  const rules = await fetchAllIgnoreRules(client, options, logger);
  const outFile = path.resolve(options.outFile ?? defaultOutFile(options.format));

  const dir = path.dirname(outFile);
  if (!(await fs.exists(dir))) {
    await fs.mkdir(dir, { recursive: true });
  }
  await fs.writeFile(outFile, formatRules(rules, options.format));

  return { count: rules.length, path: outFile };
}

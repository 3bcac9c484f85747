/**
 * Export ignore rules command
 *
 * fossa-tools export-ignores <accessToken> [--category licensing|security]
 *   [--count 1000] [--output json|csv] [--out <file>]
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { ConfigLoader } from '../../../shared/config/ConfigLoader.js';
import type { Config } from '../../../shared/config/schemas.js';
import { ConfigurationError } from '../../../shared/utils/errors.js';
import { Logger, createLogger } from '../../../shared/utils/logger.js';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import { FossaAPIClient } from '../../teams/api/FossaAPIClient.js';
import type { IFossaAPIClient } from '../../teams/api/IFossaAPIClient.js';
import { IGNORE_RULE_CATEGORIES, type IgnoreRuleCategory } from '../../teams/api/types.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters.js';
import { DEFAULT_PAGE_SIZE, exportIgnoreRules } from '../IgnoreRulesExporter.js';

export interface ExportIgnoresOptions {
  category: IgnoreRuleCategory;
  count: number;
  output: OutputFormat;
  out?: string;
  debug?: boolean;
}

export interface ExportIgnoresDeps {
  configLoader: ConfigLoader;
  fs: IFileSystem;
  createClient?: (config: Config, token: string) => IFossaAPIClient;
  createLogger?: (config: Config) => Logger;
  /**
   * Force the progress spinner on or off. By default ora enables it only on
   * an interactive terminal outside CI.
   */
  spinner?: boolean;
}

export function parsePageSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export async function runExportIgnoresCommand(
  accessToken: string,
  options: ExportIgnoresOptions,
  deps: ExportIgnoresDeps
): Promise<number> {
  let logger = new Logger({ level: options.debug ? 'debug' : 'info' });
  const spinner = ora({
    text: `Fetching ${options.category} ignore rules...`,
    isEnabled: deps.spinner,
  });

  try {
    const config = await deps.configLoader.load({ cliFlags: { debug: options.debug } });
    logger = (deps.createLogger ?? createLogger)(config);

    if (!accessToken.trim()) {
      throw new ConfigurationError('FOSSA access token is required');
    }

    const client = deps.createClient
      ? deps.createClient(config, accessToken)
      : new FossaAPIClient({
          endpoint: config.endpoint,
          token: accessToken,
          timeout: config.timeoutMs,
        });

    spinner.start();
    const result = await exportIgnoreRules(
      client,
      deps.fs,
      {
        category: options.category,
        count: options.count,
        format: options.output,
        outFile: options.out,
        onPage: (page, total) => {
          spinner.text = `Fetching ${options.category} ignore rules... page ${page} (${total} so far)`;
        },
      },
      logger
    );

    spinner.succeed(
      `Pagination complete. ${result.count} items retrieved and saved to ${chalk.cyan(result.path)}`
    );
    return 0;
  } catch (error) {
    spinner.fail(chalk.red('Export failed'));
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  } finally {
    await logger.close();
  }
}

export function createExportIgnoresCommand(deps: ExportIgnoresDeps): Command {
  return new Command('export-ignores')
    .description('Export FOSSA ignore rules (exceptions) to JSON or CSV')
    .argument('<accessToken>', 'FOSSA API bearer token')
    .addOption(
      new Option('--category <category>', 'Ignore rule category')
        .choices(IGNORE_RULE_CATEGORIES)
        .default('licensing')
    )
    .addOption(
      new Option('--count <count>', 'Number of items per page')
        .argParser(parsePageSize)
        .default(DEFAULT_PAGE_SIZE)
    )
    .addOption(
      new Option('--output <format>', 'Output format').choices(OUTPUT_FORMATS).default('json')
    )
    .option('--out <file>', 'Output file (default: paginated_results.<format>)')
    .option('--debug', 'Enable debug output', false)
    .action(async (accessToken: string, options: ExportIgnoresOptions) => {
      const exitCode = await runExportIgnoresCommand(accessToken, options, deps);
      process.exit(exitCode);
    });
}

/**
 * Team command
 *
 * fossa-tools team <teamName> [--create-only | --analyze-only] [--debug]
 *
 * Ensures the team exists on FOSSA, then runs `fossa analyze --team` and
 * `fossa test`. Reads FOSSA_API_KEY (required) and FOSSA_ENDPOINT.
 */

import { Command, Option } from 'commander';
import type { ConfigLoader } from '../../../shared/config/ConfigLoader.js';
import type { Config, RunMode } from '../../../shared/config/schemas.js';
import { ConfigurationError } from '../../../shared/utils/errors.js';
import { Logger, createLogger } from '../../../shared/utils/logger.js';
import type { IProcessExecutor } from '../../../platform/IProcessExecutor.js';
import { FossaCliAnalyzer } from '../../analysis/FossaCliAnalyzer.js';
import type { IAnalyzer } from '../../analysis/IAnalyzer.js';
import { FossaAPIClient } from '../api/FossaAPIClient.js';
import type { IFossaAPIClient } from '../api/IFossaAPIClient.js';
import { TeamProvisioner } from '../provisioner/TeamProvisioner.js';
import { TeamWorkflow } from '../TeamWorkflow.js';

export interface TeamCommandOptions {
  createOnly?: boolean;
  analyzeOnly?: boolean;
  debug?: boolean;
}

export interface TeamCommandDeps {
  configLoader: ConfigLoader;
  executor: IProcessExecutor;
  createClient?: (config: Config, apiKey: string) => IFossaAPIClient;
  createAnalyzer?: (config: Config, logger: Logger) => IAnalyzer;
  createLogger?: (config: Config) => Logger;
}

function resolveMode(options: TeamCommandOptions): RunMode {
  if (options.createOnly && options.analyzeOnly) {
    throw new ConfigurationError('--create-only and --analyze-only cannot be used together');
  }
  if (options.createOnly) return 'create-only';
  if (options.analyzeOnly) return 'analyze-only';
  return 'full';
}

/**
 * Run the team workflow and translate the outcome into a process exit code.
 */
export async function runTeamCommand(
  teamName: string,
  options: TeamCommandOptions,
  deps: TeamCommandDeps
): Promise<number> {
  let logger = new Logger({ level: options.debug ? 'debug' : 'info' });

  try {
    const config = await deps.configLoader.load({
      cliFlags: { mode: resolveMode(options), debug: options.debug },
    });
    logger = (deps.createLogger ?? createLogger)(config);

    if (!config.apiKey) {
      throw new ConfigurationError('FOSSA_API_KEY environment variable is not set');
    }
    const apiKey = config.apiKey;

    const client = deps.createClient
      ? deps.createClient(config, apiKey)
      : new FossaAPIClient({ endpoint: config.endpoint, token: apiKey, timeout: config.timeoutMs });
    const analyzer = deps.createAnalyzer
      ? deps.createAnalyzer(config, logger)
      : new FossaCliAnalyzer(
          deps.executor,
          { cliPath: config.cliPath, endpoint: config.endpoint, apiKey },
          logger
        );

    const workflow = new TeamWorkflow(config, {
      provisioner: new TeamProvisioner(client, logger),
      analyzer,
      logger,
    });
    await workflow.run(teamName);
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  } finally {
    await logger.close();
  }
}

export function createTeamCommand(deps: TeamCommandDeps): Command {
  return new Command('team')
    .description('Ensure a FOSSA team exists, then analyze the project and assign it to the team')
    .argument('<teamName>', 'Name of the team to assign the project to')
    .addOption(
      new Option('--create-only', "Only create the team, don't run analysis").conflicts(
        'analyzeOnly'
      )
    )
    .addOption(new Option('--analyze-only', 'Only run analysis (assumes the team exists)'))
    .option('--debug', 'Enable debug output', false)
    .addHelpText(
      'after',
      `
Environment Variables:
  FOSSA_API_KEY      FOSSA API key (required)
  FOSSA_ENDPOINT     FOSSA endpoint URL (default: https://app.fossa.com)

Examples:
  $ FOSSA_API_KEY=xxx fossa-tools team "Engineering Team"
  $ FOSSA_API_KEY=xxx fossa-tools team "New Team" --create-only
  $ FOSSA_API_KEY=xxx fossa-tools team "Existing Team" --analyze-only`
    )
    .action(async (teamName: string, options: TeamCommandOptions) => {
      const exitCode = await runTeamCommand(teamName, options, deps);
      process.exit(exitCode);
    });
}

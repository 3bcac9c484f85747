/**
 * Team workflow: provision the team, then run analysis scoped to it.
 *
 * A straight line of at most four external operations (list, create,
 * analyze, test). The first fatal error ends the run; nothing is rolled back.
 */

import type { Config } from '../../shared/config/schemas.js';
import { ConfigurationError } from '../../shared/utils/errors.js';
import type { Logger } from '../../shared/utils/logger.js';
import type { IAnalyzer } from '../analysis/IAnalyzer.js';
import { runAnalysis, type AnalysisOutcome } from '../analysis/runAnalysis.js';
import type { ProvisionResult, TeamProvisioner } from './provisioner/TeamProvisioner.js';

export interface TeamWorkflowDeps {
  provisioner: TeamProvisioner;
  analyzer: IAnalyzer;
  logger: Logger;
}

export interface TeamRunSummary {
  team: string;
  provision?: ProvisionResult;
  analysis?: AnalysisOutcome;
}

export class TeamWorkflow {
  constructor(
    private readonly config: Config,
    private readonly deps: TeamWorkflowDeps
  ) {}

  async run(team: string): Promise<TeamRunSummary> {
    const { logger, provisioner, analyzer } = this.deps;
    if (!team.trim()) {
      throw new ConfigurationError('Team name is required');
    }

    const runsProvisioning = this.config.mode !== 'analyze-only';
    const runsAnalysis = this.config.mode !== 'create-only';

    logger.info('FOSSA Team Management and Analysis');
    logger.info(`Team: ${team}`);
    logger.info(`Endpoint: ${this.config.endpoint}`);

    if (runsAnalysis && !(await analyzer.isAvailable())) {
      throw new ConfigurationError(
        `fossa CLI is required but could not be run (${this.config.cliPath}). ` +
          'Install it or point FOSSA_CLI_PATH at the binary.'
      );
    }

    const summary: TeamRunSummary = { team };

    if (runsProvisioning) {
      summary.provision = await provisioner.provision(team);
    }

    if (runsAnalysis) {
      summary.analysis = await runAnalysis(analyzer, team, logger);
      logger.info(`Project analyzed and assigned to team '${team}'`);
      logger.info(`View results at: ${this.config.endpoint}`);
    }

    return summary;
  }
}

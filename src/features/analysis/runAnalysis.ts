import { AnalysisError } from '../../shared/utils/errors.js';
import type { Logger } from '../../shared/utils/logger.js';
import type { ExitStatus, IAnalyzer } from './IAnalyzer.js';

export interface AnalysisOutcome {
  primaryExitCode: ExitStatus;
  policyExitCode: ExitStatus;
  policyPassed: boolean;
}

/**
 * Primary failure is fatal. A failed policy check is only reported: the
 * findings are left for a human to triage and the run still succeeds.
 */
export async function runAnalysis(
  analyzer: IAnalyzer,
  team: string,
  logger: Logger
): Promise<AnalysisOutcome> {
  logger.info(`Running FOSSA analysis and assigning to team '${team}'...`);

  const primaryExitCode = await analyzer.runPrimary(team);
  if (primaryExitCode !== 0) {
    throw new AnalysisError(`FOSSA analysis failed (exit code ${primaryExitCode})`, primaryExitCode);
  }
  logger.info('FOSSA analysis completed successfully');

  logger.info('Running FOSSA test for license and vulnerability checks...');
  const policyExitCode = await analyzer.runSecondary();
  const policyPassed = policyExitCode === 0;

  if (policyPassed) {
    logger.info('FOSSA test completed successfully');
  } else {
    logger.warn(
      `FOSSA test failed (license or vulnerability issues found, exit code ${policyExitCode})`
    );
  }

  return { primaryExitCode, policyExitCode, policyPassed };
}

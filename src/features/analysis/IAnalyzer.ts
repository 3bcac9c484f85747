/**
 * External analyzer capability.
 *
 * The real implementation shells out to the FOSSA CLI; tests script the exit
 * statuses instead.
 */

export type ExitStatus = number;

export interface IAnalyzer {
  /**
   * Dependency analysis, scoped to a team. Non-zero means the work did not happen.
   */
  runPrimary(team: string): Promise<ExitStatus>;

  /**
   * License and vulnerability policy check. Non-zero means findings need triage.
   */
  runSecondary(): Promise<ExitStatus>;

  /**
   * Whether the analyzer binary can be launched at all
   */
  isAvailable(): Promise<boolean>;
}

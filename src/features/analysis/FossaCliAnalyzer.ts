/**
 * FOSSA CLI analyzer
 *
 * Runs `fossa analyze --team <name>` and `fossa test`. The CLI reads its
 * endpoint and credential from FOSSA_ENDPOINT / FOSSA_API_KEY, so both are
 * passed through the child environment rather than on the command line.
 */

import type { IProcessExecutor } from '../../platform/IProcessExecutor.js';
import type { Logger } from '../../shared/utils/logger.js';
import type { ExitStatus, IAnalyzer } from './IAnalyzer.js';

export interface FossaCliAnalyzerConfig {
  /**
   * Path or name of the fossa binary
   * @default 'fossa'
   */
  cliPath?: string;
  endpoint: string;
  apiKey?: string;
}

export class FossaCliAnalyzer implements IAnalyzer {
  private readonly cliPath: string;

  constructor(
    private readonly executor: IProcessExecutor,
    private readonly config: FossaCliAnalyzerConfig,
    private readonly logger: Logger
  ) {
    this.cliPath = config.cliPath ?? 'fossa';
  }

  async runPrimary(team: string): Promise<ExitStatus> {
    return this.run(['analyze', '--team', team]);
  }

  async runSecondary(): Promise<ExitStatus> {
    return this.run(['test']);
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.executor.execute(this.cliPath, ['--version']);
    if (result.exitCode === 0) {
      this.logger.debug(`Using ${this.cliPath}: ${result.stdout.trim()}`);
      return true;
    }
    return false;
  }

  private async run(args: string[]): Promise<ExitStatus> {
    this.logger.debug(`Running: ${[this.cliPath, ...args].join(' ')}`);
    const result = await this.executor.execute(this.cliPath, args, {
      env: this.childEnv(),
      stdio: 'inherit',
    });
    return result.exitCode;
  }

  private childEnv(): Record<string, string> {
    const env: Record<string, string> = { FOSSA_ENDPOINT: this.config.endpoint };
    if (this.config.apiKey) {
      env.FOSSA_API_KEY = this.config.apiKey;
    }
    return env;
  }
}

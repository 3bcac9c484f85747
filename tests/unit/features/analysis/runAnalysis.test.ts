/**
 * Tests for the analysis step policy: primary fatal, policy check advisory
 */

import { describe, it, expect, vi } from 'vitest';
import { runAnalysis } from '@/features/analysis/runAnalysis.js';
import { AnalysisError } from '@/shared/utils/errors.js';
import { FakeAnalyzer, silentLogger } from '../../../helpers/fakes.js';

describe('runAnalysis', () => {
  it('should succeed when both steps pass', async () => {
    const analyzer = new FakeAnalyzer(0, 0);

    const outcome = await runAnalysis(analyzer, 'Platform', silentLogger());

    expect(outcome).toEqual({ primaryExitCode: 0, policyExitCode: 0, policyPassed: true });
    expect(analyzer.runPrimary).toHaveBeenCalledWith('Platform');
  });

  it('should fail on a primary failure and skip the policy check', async () => {
    const analyzer = new FakeAnalyzer(2, 0);

    const error = await runAnalysis(analyzer, 'Platform', silentLogger()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalysisError);
    expect(error).toMatchObject({ exitCode: 2 });
    expect(analyzer.runSecondary).not.toHaveBeenCalled();
  });

  it('should only warn when the policy check fails', async () => {
    const analyzer = new FakeAnalyzer(0, 1);
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');

    const outcome = await runAnalysis(analyzer, 'Platform', logger);

    expect(outcome).toEqual({ primaryExitCode: 0, policyExitCode: 1, policyPassed: false });
    expect(warn).toHaveBeenCalledWith(
      'FOSSA test failed (license or vulnerability issues found, exit code 1)'
    );
  });
});

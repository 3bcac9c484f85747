/**
 * Analysis feature - external FOSSA CLI runs
 */

export type { IAnalyzer, ExitStatus } from './IAnalyzer.js';
export { FossaCliAnalyzer, type FossaCliAnalyzerConfig } from './FossaCliAnalyzer.js';
export { runAnalysis, type AnalysisOutcome } from './runAnalysis.js';

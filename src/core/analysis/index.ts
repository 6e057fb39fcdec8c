export { runAnalysis, resolveConfig } from './runner.js';
export type { AnalysisOptions, AnalysisReport, AnalysisDiagnostics } from './types.js';

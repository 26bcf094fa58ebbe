export * from './types.js';
export * from './errors.js';

// Config
export {
  EvaluatorConfigSchema,
  EvaluationWindowSchema,
  TradingDateSchema,
  type EvaluatorConfig,
  type EvaluatorConfigInput,
} from './config/schema.js';

// Metrics
export {
  calculateAnnualReturn,
  calculateMaxDrawdown,
  calculateSharpeRatio,
  calculateTotalReturn,
  calculateTradeStats,
  extractHoldingReturns,
} from './metrics/calculator.js';

// Engine
export { PerformanceEvaluator, type PerformanceEvaluatorOptions } from './engine/evaluator.js';
export { compareStrategies } from './engine/comparison.js';
export {
  evaluateStrategies,
  runAnalysisBatch,
  type AnalysisMode,
  type AnalysisRunResult,
  type EvaluateStrategiesInput,
  type RunAnalysisOptions,
  type StrategyBatchResult,
} from './engine/batch.js';
export { groupResultsByCode, joinResultsWithBars } from './engine/join.js';

// Data
export {
  AnalysisResultSchema,
  BarRecordSchema,
  JsonFileBarSource,
  groupBarsByCode,
  loadAnalysisResults,
  loadBarFile,
  parseAnalysisResults,
  parseBars,
  validateBarSequence,
} from './data/loader.js';

// Types
export * from './types.js';

// Errors / Config
export * from './errors.js';
export * from './config.js';

// Indicators
export { IndicatorEngine, type IndicatorEngineOptions } from './indicators/engine.js';
export { calculateSMA, calculateMultipleSMA } from './indicators/ma.js';
export { calculateEMA, calculateMACD } from './indicators/macd.js';
export { calculateRSI, classifyRSI } from './indicators/rsi.js';
export { calculateRSV, calculateKDJ } from './indicators/kdj.js';
export { calculateBollinger } from './indicators/bollinger.js';
export { calculateVolumeMA } from './indicators/volume.js';

// Signals
export { SignalEngine, type SignalEngineOptions } from './signals/engine.js';
export { detectCrossover, type CrossoverResult } from './signals/crossover.js';

// Scoring
export { ScoringEngine, type ScoringEngineOptions, type ScoringInput } from './scoring/engine.js';
export { calculateCompositeScore, determineRating } from './scoring/score.js';
export {
  calculateDailyReturns,
  calculateAnnualizedVolatility,
  classifyRisk,
  estimateExpectedReturn,
  mean,
  standardDeviation,
} from './scoring/risk.js';

// Analysis
export {
  TechnicalAnalyzer,
  DEFAULT_STRATEGY,
  type TechnicalAnalyzerOptions,
  type DetailedAnalysis,
} from './analysis/analyzer.js';
export { replayAnalysis, type ReplayOptions } from './analysis/replay.js';
export {
  analyzeBatch,
  createBatchSummary,
  describeError,
  type AnalyzeBatchOptions,
  type AnalysisBatchResult,
} from './analysis/batch.js';

// Providers
export { InMemoryBarSource, type BarSource } from './providers/bar-source.js';

import type { AnalysisResult } from '@signal-lab/analysis-core';
import { loadAnalysisResults, loadBarFile } from '../data/loader.js';
import { evaluateStrategies, type StrategyBatchResult } from '../engine/batch.js';
import { PerformanceEvaluator } from '../engine/evaluator.js';
import type { EvaluationOutcome } from '../types.js';
import type { CommandContext } from './context.js';
import type { CompareOptions, EvaluateOptions } from './options.js';
import { writeJsonOutput } from './output.js';

/**
 * 단일 전략 성과 평가
 */
export async function runEvaluate(
  options: EvaluateOptions,
  context: CommandContext
): Promise<Omit<EvaluationOutcome, 'instruments'>> {
  const { env, logger } = context;
  const [barsByCode, results] = await Promise.all([
    loadBarFile(options.bars),
    loadAnalysisResults(options.results),
  ]);

  const evaluator = new PerformanceEvaluator({
    config: { riskFreeRate: options.riskFreeRate ?? env.riskFreeRate },
    logger,
  });

  const { record, instrumentsEvaluated, skipped } = evaluator.evaluate({
    strategy: options.strategy ?? env.defaultStrategy,
    window: { start: options.start, end: options.end },
    results,
    barsByCode,
  });

  const output = { record, instrumentsEvaluated, skipped };
  await writeJsonOutput(output, options.out);
  return output;
}

/**
 * 여러 전략 비교 (전략 미지정 시 결과 파일에 있는 전략 전체)
 */
export async function runCompare(
  options: CompareOptions,
  context: CommandContext
): Promise<Omit<StrategyBatchResult, 'outcomes'>> {
  const { env, logger, signal } = context;
  const [barsByCode, results] = await Promise.all([
    loadBarFile(options.bars),
    loadAnalysisResults(options.results),
  ]);

  const evaluator = new PerformanceEvaluator({
    config: { riskFreeRate: options.riskFreeRate ?? env.riskFreeRate },
    logger,
  });

  const { comparison, summary } = evaluateStrategies(evaluator, {
    strategies: options.strategies ?? listStrategies(results),
    window: { start: options.start, end: options.end },
    results,
    barsByCode,
    signal,
    logger,
  });

  const output = { comparison, summary };
  await writeJsonOutput(output, options.out);
  return output;
}

export function listStrategies(results: readonly AnalysisResult[]): string[] {
  return [...new Set(results.map((result) => result.strategy))];
}

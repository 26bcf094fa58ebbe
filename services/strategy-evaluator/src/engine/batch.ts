import {
  analyzeBatch,
  createBatchSummary,
  describeError,
  replayAnalysis,
  type AnalysisResult,
  type Bar,
  type BarSource,
  type BatchSummary,
  type TechnicalAnalyzer,
} from '@signal-lab/analysis-core';
import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import type {
  EvaluationOutcome,
  EvaluationWindow,
  StrategyComparison,
} from '../types.js';
import { compareStrategies } from './comparison.js';
import type { PerformanceEvaluator } from './evaluator.js';

// ============================================================
// 분석 배치 (BarSource → AnalysisResult)
// ============================================================

export type AnalysisMode = 'latest' | 'replay';

// 분석 윈도우가 구간 시작 전 이력을 쓰므로 처음부터 읽는다
const EARLIEST_DATE = '1900-01-01';
const DEFAULT_LOOKBACK = 300;

export interface RunAnalysisOptions {
  analyzer: TechnicalAnalyzer;
  codes: readonly string[];
  window: EvaluationWindow;
  /** latest: 구간 마지막 Bar 기준 1건, replay: 구간 내 매 거래일 */
  mode?: AnalysisMode;
  /** 분석에 사용할 최근 Bar 수 (기본값: 300) */
  lookback?: number;
  signal?: AbortSignal;
  logger?: LogSink;
}

export interface AnalysisRunResult {
  results: AnalysisResult[];
  barsByCode: Record<string, Bar[]>;
  summary: BatchSummary;
}

/**
 * 종목 목록 일괄 분석
 *
 * 1. BarSource에서 종목별 Bar 로드 (실패 종목은 failed로 집계)
 * 2. latest 모드: 종목별 최신 분석 1건 / replay 모드: 구간 내 매 거래일 분석
 *
 * 종목 간 순서 의존성은 없으며, 중단 신호는 종목 사이에서 확인한다.
 */
export async function runAnalysisBatch(
  source: BarSource,
  options: RunAnalysisOptions
): Promise<AnalysisRunResult> {
  const { analyzer, codes, window, mode = 'latest', lookback = DEFAULT_LOOKBACK, signal } = options;
  const logger = options.logger ?? createLogger('analysis-runner');

  const summary = createBatchSummary(codes.length);
  const fetched = new Map<string, Bar[]>();

  for (const code of codes) {
    if (signal?.aborted) {
      summary.cancelled = true;
      break;
    }

    try {
      fetched.set(code, await source.fetchBars(code, EARLIEST_DATE, window.end));
    } catch (error) {
      summary.failed++;
      summary.failures.push({ code, kind: 'failed', reason: describeError(error) });
      logger.error(`종목 ${code} Bar 로드 실패`, error);
    }
  }

  const barsByCode: Record<string, Bar[]> = Object.fromEntries(fetched);

  if (summary.cancelled) {
    logger.warn('Bar 로드 중 중단 요청', { loaded: fetched.size });
    return { results: [], barsByCode, summary };
  }

  if (mode === 'latest') {
    const recent = Object.fromEntries(
      Object.entries(barsByCode).map(([code, bars]) => [code, bars.slice(-lookback)])
    );
    const batch = analyzeBatch(analyzer, recent, { signal, logger });
    return { results: batch.results, barsByCode, summary: mergeSummaries(summary, batch.summary) };
  }

  const results: AnalysisResult[] = [];

  for (const [code, bars] of Object.entries(barsByCode)) {
    if (signal?.aborted) {
      summary.cancelled = true;
      break;
    }

    try {
      const replayed = replayAnalysis(analyzer, bars, {
        lookback,
        from: window.start,
        to: window.end,
        signal,
      });

      // 도중에 중단된 종목의 이력은 불완전하므로 버린다
      if (signal?.aborted) {
        summary.cancelled = true;
        logger.warn(`종목 ${code} 재생 분석 중단`, { partialResults: replayed.length });
        break;
      }

      if (replayed.length === 0) {
        summary.skipped++;
        summary.failures.push({
          code,
          kind: 'skipped',
          reason: `구간 내 분석 가능한 거래일 없음 (Bar ${bars.length}개)`,
        });
        continue;
      }

      results.push(...replayed);
      summary.succeeded++;
    } catch (error) {
      summary.failed++;
      summary.failures.push({ code, kind: 'failed', reason: describeError(error) });
      logger.error(`종목 ${code} 재생 분석 실패`, error);
    }
  }

  logger.info('재생 분석 완료', {
    results: results.length,
    succeeded: summary.succeeded,
    skipped: summary.skipped,
    failed: summary.failed,
    cancelled: summary.cancelled,
  });

  return { results, barsByCode, summary };
}

function mergeSummaries(fetch: BatchSummary, analysis: BatchSummary): BatchSummary {
  return {
    total: fetch.total,
    succeeded: analysis.succeeded,
    skipped: analysis.skipped,
    failed: fetch.failed + analysis.failed,
    cancelled: fetch.cancelled || analysis.cancelled,
    failures: [...fetch.failures, ...analysis.failures],
  };
}

// ============================================================
// 평가 배치 (여러 전략)
// ============================================================

export interface EvaluateStrategiesInput {
  strategies: readonly string[];
  window: EvaluationWindow;
  results: readonly AnalysisResult[];
  barsByCode: Readonly<Record<string, readonly Bar[]>>;
  signal?: AbortSignal;
  logger?: LogSink;
}

export interface StrategyBatchResult {
  outcomes: EvaluationOutcome[];
  comparison: StrategyComparison;
  summary: BatchSummary;
}

/**
 * 여러 전략 일괄 평가 후 비교
 *
 * 평가 가능한 종목이 없는 전략은 skipped, 예외가 난 전략은 failed로 집계한다.
 * 요약의 code 필드에는 전략 식별자가 들어간다.
 */
export function evaluateStrategies(
  evaluator: PerformanceEvaluator,
  input: EvaluateStrategiesInput
): StrategyBatchResult {
  const logger = input.logger ?? createLogger('strategy-batch');
  const summary = createBatchSummary(input.strategies.length);
  const outcomes: EvaluationOutcome[] = [];

  for (const strategy of input.strategies) {
    if (input.signal?.aborted) {
      summary.cancelled = true;
      logger.warn('전략 평가 중단 요청', { evaluated: outcomes.length });
      break;
    }

    try {
      const outcome = evaluator.evaluate({
        strategy,
        window: input.window,
        results: input.results,
        barsByCode: input.barsByCode,
      });

      if (outcome.instrumentsEvaluated === 0) {
        summary.skipped++;
        summary.failures.push({
          code: strategy,
          kind: 'skipped',
          reason: `평가 가능한 종목 없음 (건너뛴 종목 ${outcome.skipped.length}개)`,
        });
        continue;
      }

      outcomes.push(outcome);
      summary.succeeded++;
    } catch (error) {
      summary.failed++;
      summary.failures.push({ code: strategy, kind: 'failed', reason: describeError(error) });
      logger.error(`전략 ${strategy} 평가 실패`, error);
    }
  }

  const comparison = compareStrategies(outcomes.map((outcome) => outcome.record));

  logger.info('전략 비교 완료', {
    strategies: input.strategies.length,
    evaluated: summary.succeeded,
    best: comparison.best.annualReturn?.strategy ?? null,
  });

  return { outcomes, comparison, summary };
}

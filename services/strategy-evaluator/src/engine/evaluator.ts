import {
  InvalidConfigError,
  calculateDailyReturns,
  mean,
  parseConfig,
  type AnalysisResult,
  type Bar,
  type PerformanceRecord,
} from '@signal-lab/analysis-core';
import { calendarDaysBetween, createLogger, type LogSink } from '@signal-lab/shared-utils';
import {
  EvaluationWindowSchema,
  EvaluatorConfigSchema,
  type EvaluatorConfig,
  type EvaluatorConfigInput,
} from '../config/schema.js';
import {
  calculateAnnualReturn,
  calculateMaxDrawdown,
  calculateSharpeRatio,
  calculateTotalReturn,
  calculateTradeStats,
  extractHoldingReturns,
} from '../metrics/calculator.js';
import type {
  EvaluationInput,
  EvaluationOutcome,
  InstrumentMetrics,
  SkippedInstrument,
} from '../types.js';
import { barsBetween, groupResultsByCode, isWithinWindow, joinResultsWithBars } from './join.js';

export interface PerformanceEvaluatorOptions {
  config?: EvaluatorConfigInput;
  logger?: LogSink;
}

type InstrumentEvaluation =
  | { status: 'evaluated'; metrics: InstrumentMetrics }
  | { status: 'skipped'; skipped: SkippedInstrument };

/**
 * 전략 성과 평가기
 *
 * 한 전략의 분석 결과와 종목별 가격 이력으로 PerformanceRecord 1건을 만든다.
 * 포트폴리오 지표는 종목별 지표의 단순 평균 (자본 가중 아님).
 */
export class PerformanceEvaluator {
  readonly config: EvaluatorConfig;
  private readonly logger: LogSink;

  constructor(options: PerformanceEvaluatorOptions = {}) {
    this.config = parseConfig('PerformanceEvaluator', EvaluatorConfigSchema, options.config);
    this.logger = options.logger ?? createLogger('performance-evaluator');
  }

  evaluate(input: EvaluationInput): EvaluationOutcome {
    const { strategy, barsByCode } = input;
    const window = parseConfig('PerformanceEvaluator', EvaluationWindowSchema, input.window);

    if (strategy.trim().length === 0) {
      throw new InvalidConfigError('PerformanceEvaluator', ['strategy: 전략 식별자가 비어 있습니다']);
    }

    const results = input.results.filter(
      (result) => result.strategy === strategy && isWithinWindow(result.analysisDate, window)
    );

    if (results.length === 0) {
      this.logger.warn('평가 구간에 분석 결과 없음', { strategy, ...window });
    }

    const instruments: InstrumentMetrics[] = [];
    const skipped: SkippedInstrument[] = [];

    for (const [code, group] of groupResultsByCode(results)) {
      const bars = Object.hasOwn(barsByCode, code) ? barsByCode[code] : [];
      const evaluation = this.evaluateInstrument(code, group, bars);

      if (evaluation.status === 'skipped') {
        skipped.push(evaluation.skipped);
        this.logger.debug('종목 평가 건너뜀', evaluation.skipped);
        continue;
      }

      instruments.push(evaluation.metrics);
    }

    const totalReturn = mean(instruments.map((m) => m.totalReturn));
    const tradeStats = calculateTradeStats(instruments.flatMap((m) => m.holdingReturns));

    const record: PerformanceRecord = {
      strategy,
      windowStart: window.start,
      windowEnd: window.end,
      totalReturn,
      annualReturn: calculateAnnualReturn(
        totalReturn,
        calendarDaysBetween(window.start, window.end),
        this.config.daysPerYear
      ),
      maxDrawdown: mean(instruments.map((m) => m.maxDrawdown)),
      sharpeRatio: calculateSharpeRatio(
        instruments.flatMap((m) => m.dailyReturns),
        this.config.riskFreeRate,
        this.config.tradingDaysPerYear
      ),
      winRate: tradeStats.winRate,
      profitLossRatio: tradeStats.profitLossRatio,
      tradeCount: results.length,
    };

    this.logger.info('전략 성과 평가 완료', {
      strategy,
      window,
      instrumentsEvaluated: instruments.length,
      skipped: skipped.length,
      trades: tradeStats.trades,
    });

    return { record, instrumentsEvaluated: instruments.length, instruments, skipped };
  }

  private evaluateInstrument(
    code: string,
    results: readonly AnalysisResult[],
    bars: readonly Bar[]
  ): InstrumentEvaluation {
    const joined = joinResultsWithBars(results, bars);

    if (joined.length < 2) {
      return {
        status: 'skipped',
        skipped: {
          code,
          reason: joined.length === 0 ? 'EMPTY_JOIN' : 'INSUFFICIENT_JOIN',
          joinedPoints: joined.length,
        },
      };
    }

    const first = joined[0];
    const last = joined[joined.length - 1];
    const heldBars = barsBetween(bars, first.date, last.date);

    return {
      status: 'evaluated',
      metrics: {
        code,
        joinedPoints: joined.length,
        totalReturn: calculateTotalReturn(first.close, last.close),
        maxDrawdown: calculateMaxDrawdown(heldBars.map((bar) => bar.close)),
        dailyReturns: calculateDailyReturns(heldBars),
        holdingReturns: extractHoldingReturns(joined),
      },
    };
  }
}

import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import {
  ScoringConfigSchema,
  parseConfig,
  type ScoringConfig,
  type ScoringConfigInput,
} from '../config.js';
import { InsufficientHistoryError } from '../errors.js';
import type { AnalysisResult, Bar, Rating, RiskLevel, SignalSet } from '../types.js';
import {
  calculateAnnualizedVolatility,
  classifyRisk,
  estimateExpectedReturn,
} from './risk.js';
import { calculateCompositeScore, determineRating } from './score.js';

export interface ScoringEngineOptions {
  config?: ScoringConfigInput;
  logger?: LogSink;
}

export interface ScoringInput {
  bars: readonly Bar[];
  signals: Readonly<SignalSet>;
  strategy: string;
}

/**
 * 시그널 집합 → 복합 점수 / 등급 / 위험도 / 기대 수익률
 *
 * 입력 윈도우에 대한 결정적 함수이며 호출 간 상태를 갖지 않는다.
 */
export class ScoringEngine {
  readonly config: ScoringConfig;
  private readonly logger: LogSink;

  constructor(options: ScoringEngineOptions = {}) {
    this.config = parseConfig('ScoringEngine', ScoringConfigSchema, options.config);
    this.logger = options.logger ?? createLogger('scoring-engine');
  }

  /**
   * 최소 이력 전제 조건 확인
   *
   * @throws InsufficientHistoryError - Bar 수가 minHistory 미만
   */
  assertSufficientHistory(bars: readonly Bar[]): void {
    if (bars.length < this.config.minHistory) {
      throw new InsufficientHistoryError(
        this.config.minHistory,
        bars.length,
        bars[bars.length - 1]?.code
      );
    }
  }

  calculateScore(signals: Readonly<SignalSet>): number {
    return calculateCompositeScore(signals, this.config.weights, this.config.baseline);
  }

  determineRating(score: number): Rating {
    return determineRating(score, this.config.buyThreshold, this.config.sellThreshold);
  }

  determineRiskLevel(bars: readonly Bar[]): RiskLevel {
    const volatility = calculateAnnualizedVolatility(bars, this.config.tradingDaysPerYear);
    return classifyRisk(volatility, this.config.volatilityBands);
  }

  estimateExpectedReturn(bars: readonly Bar[]): number {
    return estimateExpectedReturn(
      bars,
      this.config.expectedReturnWindow,
      this.config.tradingDaysPerYear
    );
  }

  /**
   * AnalysisResult 생성 (마지막 Bar 기준)
   *
   * 전제 조건을 만족하지 못하면 부분 결과 없이 예외를 던진다.
   */
  score(input: ScoringInput): AnalysisResult {
    const { bars, signals, strategy } = input;
    this.assertSufficientHistory(bars);

    const latest = bars[bars.length - 1];
    const score = this.calculateScore(signals);
    const rating = this.determineRating(score);

    const result: AnalysisResult = {
      code: latest.code,
      analysisDate: latest.date,
      strategy,
      signals: { ...signals },
      score,
      rating,
      riskLevel: this.determineRiskLevel(bars),
      expectedReturn: this.estimateExpectedReturn(bars),
    };

    this.logger.debug('점수 산출 완료', {
      code: result.code,
      date: result.analysisDate,
      score: result.score,
      rating: result.rating,
    });

    return result;
  }
}

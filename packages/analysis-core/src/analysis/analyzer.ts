import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import {
  IndicatorConfigSchema,
  parseConfig,
  type IndicatorConfigInput,
  type ScoringConfigInput,
  type SignalConfigInput,
} from '../config.js';
import { InvalidConfigError } from '../errors.js';
import { IndicatorEngine } from '../indicators/engine.js';
import { ScoringEngine } from '../scoring/engine.js';
import { SignalEngine } from '../signals/engine.js';
import type { AnalysisResult, Bar, IndicatorPoint, SignalDiagnostic } from '../types.js';

export const DEFAULT_STRATEGY = 'technical_composite';

export interface TechnicalAnalyzerOptions {
  strategy?: string;
  indicators?: IndicatorConfigInput;
  signals?: SignalConfigInput;
  scoring?: ScoringConfigInput;
  logger?: LogSink;
}

export interface DetailedAnalysis {
  result: AnalysisResult;
  points: IndicatorPoint[];
  diagnostics: SignalDiagnostic[];
}

/**
 * Bar → 지표 → 시그널 → 점수 파이프라인
 *
 * 시그널 판정에 쓰는 MA/RSI 기간은 지표 설정에 자동으로 병합된다.
 */
export class TechnicalAnalyzer {
  readonly strategy: string;
  readonly indicatorEngine: IndicatorEngine;
  readonly signalEngine: SignalEngine;
  readonly scoringEngine: ScoringEngine;
  private readonly logger: LogSink;

  constructor(options: TechnicalAnalyzerOptions = {}) {
    const strategy = options.strategy?.trim() ?? DEFAULT_STRATEGY;
    if (strategy.length === 0) {
      throw new InvalidConfigError('TechnicalAnalyzer', ['strategy: 전략 식별자가 비어 있습니다']);
    }

    this.strategy = strategy;
    this.logger = options.logger ?? createLogger('technical-analyzer');
    this.signalEngine = new SignalEngine({ config: options.signals, logger: this.logger });
    this.scoringEngine = new ScoringEngine({ config: options.scoring, logger: this.logger });

    const indicatorConfig = parseConfig('IndicatorEngine', IndicatorConfigSchema, options.indicators);
    const required = this.signalEngine.requiredPeriods();

    this.indicatorEngine = new IndicatorEngine({
      config: {
        ...indicatorConfig,
        maPeriods: mergePeriods(indicatorConfig.maPeriods, required.maPeriods),
        rsiPeriods: mergePeriods(indicatorConfig.rsiPeriods, required.rsiPeriods),
      },
      logger: this.logger,
    });
  }

  get minHistory(): number {
    return this.scoringEngine.config.minHistory;
  }

  /**
   * 마지막 Bar 기준 AnalysisResult 생성
   *
   * @throws InsufficientHistoryError - Bar 수가 최소 이력 미만
   */
  analyze(bars: readonly Bar[]): AnalysisResult {
    return this.analyzeDetailed(bars).result;
  }

  analyzeDetailed(bars: readonly Bar[]): DetailedAnalysis {
    // 지표 계산 전에 전제 조건부터 확인
    this.scoringEngine.assertSufficientHistory(bars);

    const points = this.indicatorEngine.compute(bars);
    const { signals, diagnostics } = this.signalEngine.evaluate(points);
    const result = this.scoringEngine.score({ bars, signals, strategy: this.strategy });

    return { result, points, diagnostics };
  }
}

function mergePeriods(configured: readonly number[], required: readonly number[]): number[] {
  return [...new Set([...configured, ...required])].sort((a, b) => a - b);
}

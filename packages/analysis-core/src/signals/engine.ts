import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import {
  SignalConfigSchema,
  parseConfig,
  type SignalConfig,
  type SignalConfigInput,
} from '../config.js';
import { classifyRSI } from '../indicators/rsi.js';
import type {
  IndicatorPoint,
  IndicatorValue,
  Signal,
  SignalDiagnostic,
  SignalEvaluation,
  SignalFamily,
} from '../types.js';
import { detectCrossover } from './crossover.js';

export interface SignalEngineOptions {
  config?: SignalConfigInput;
  logger?: LogSink;
}

type CrossoverFamily = Extract<SignalFamily, 'ma' | 'macd' | 'kdj'>;

/**
 * 지표 계열별 최신 값 → buy / sell / hold 시그널
 *
 * 어떤 경우에도 예외를 던지지 않는다. 값이 없거나 포인트가 부족하면
 * hold로 강등하고 진단 정보를 남긴다.
 */
export class SignalEngine {
  readonly config: SignalConfig;
  private readonly logger: LogSink;

  constructor(options: SignalEngineOptions = {}) {
    this.config = parseConfig('SignalEngine', SignalConfigSchema, options.config);
    this.logger = options.logger ?? createLogger('signal-engine');
  }

  /**
   * 시그널 판정에 필요한 지표 기간 (IndicatorEngine 설정에 병합용)
   */
  requiredPeriods(): { maPeriods: number[]; rsiPeriods: number[] } {
    return {
      maPeriods: [this.config.ma.short, this.config.ma.long],
      rsiPeriods: [this.config.rsiPeriod],
    };
  }

  evaluate(points: readonly IndicatorPoint[]): SignalEvaluation {
    const diagnostics: SignalDiagnostic[] = [];

    const signals = {
      macd: this.evaluateCrossover('macd', points, diagnostics),
      rsi: this.evaluateRSI(points, diagnostics),
      kdj: this.evaluateCrossover('kdj', points, diagnostics),
      bollinger: this.evaluateBollinger(points, diagnostics),
      ma: this.evaluateCrossover('ma', points, diagnostics),
    };

    if (diagnostics.length > 0) {
      this.logger.debug('일부 시그널 hold로 강등', {
        date: points[points.length - 1]?.date ?? null,
        diagnostics,
      });
    }

    return { signals, diagnostics };
  }

  private evaluateCrossover(
    family: CrossoverFamily,
    points: readonly IndicatorPoint[],
    diagnostics: SignalDiagnostic[]
  ): Signal {
    if (points.length < 2) {
      diagnostics.push({
        family,
        reason: 'INSUFFICIENT_HISTORY',
        detail: `교차 판정에 최소 2개의 포인트가 필요합니다. 현재: ${points.length}개`,
      });
      return 'hold';
    }

    const previous = points[points.length - 2];
    const latest = points[points.length - 1];
    const result = detectCrossover(this.linesOf(family, previous), this.linesOf(family, latest));

    if (result.status === 'undefined') {
      diagnostics.push({ family, reason: 'UNDEFINED_INDICATOR', detail: result.detail });
      return 'hold';
    }

    return result.signal;
  }

  private linesOf(family: CrossoverFamily, point: IndicatorPoint): [IndicatorValue, IndicatorValue] {
    switch (family) {
      case 'ma':
        return [point.ma[this.config.ma.short] ?? null, point.ma[this.config.ma.long] ?? null];
      case 'macd':
        return [point.macd.dif, point.macd.dea];
      case 'kdj':
        return [point.kdj.k, point.kdj.d];
    }
  }

  private evaluateRSI(points: readonly IndicatorPoint[], diagnostics: SignalDiagnostic[]): Signal {
    const latest = points[points.length - 1];
    if (!latest) {
      diagnostics.push({ family: 'rsi', reason: 'INSUFFICIENT_HISTORY', detail: '포인트 없음' });
      return 'hold';
    }

    const value = latest.rsi[this.config.rsiPeriod] ?? null;
    if (value === null) {
      diagnostics.push({
        family: 'rsi',
        reason: 'UNDEFINED_INDICATOR',
        detail: `RSI${this.config.rsiPeriod} 값 없음`,
      });
      return 'hold';
    }

    // 과매도 → 매수, 과매수 → 매도
    switch (classifyRSI(value, this.config.rsiOversold, this.config.rsiOverbought)) {
      case 'oversold':
        return 'buy';
      case 'overbought':
        return 'sell';
      default:
        return 'hold';
    }
  }

  private evaluateBollinger(
    points: readonly IndicatorPoint[],
    diagnostics: SignalDiagnostic[]
  ): Signal {
    const latest = points[points.length - 1];
    if (!latest) {
      diagnostics.push({ family: 'bollinger', reason: 'INSUFFICIENT_HISTORY', detail: '포인트 없음' });
      return 'hold';
    }

    const { upper, lower } = latest.bollinger;
    if (upper === null || lower === null) {
      diagnostics.push({
        family: 'bollinger',
        reason: 'UNDEFINED_INDICATOR',
        detail: '볼린저 밴드 값 없음',
      });
      return 'hold';
    }

    // 상단 돌파 → 매수, 하단 이탈 → 매도
    if (latest.close.gt(upper)) return 'buy';
    if (latest.close.lt(lower)) return 'sell';
    return 'hold';
  }
}

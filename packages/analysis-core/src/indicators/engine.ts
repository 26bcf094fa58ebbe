import Big from 'big.js';
import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import {
  IndicatorConfigSchema,
  parseConfig,
  type IndicatorConfig,
  type IndicatorConfigInput,
} from '../config.js';
import type { Bar, IndicatorPoint, IndicatorValue } from '../types.js';
import { calculateBollinger } from './bollinger.js';
import { calculateKDJ } from './kdj.js';
import { calculateSMA } from './ma.js';
import { calculateMACD } from './macd.js';
import { calculateRSI } from './rsi.js';
import { calculateVolumeMA } from './volume.js';

export interface IndicatorEngineOptions {
  config?: IndicatorConfigInput;
  logger?: LogSink;
}

/**
 * Bar 시퀀스 → IndicatorPoint 시퀀스 변환기
 *
 * - 출력은 입력과 1:1 정렬
 * - 이력이 부족한 지표는 예외 대신 null
 * - 빈 입력이면 빈 출력
 */
export class IndicatorEngine {
  readonly config: IndicatorConfig;
  private readonly logger: LogSink;

  constructor(options: IndicatorEngineOptions = {}) {
    this.config = parseConfig('IndicatorEngine', IndicatorConfigSchema, options.config);
    this.logger = options.logger ?? createLogger('indicator-engine');
  }

  compute(bars: readonly Bar[]): IndicatorPoint[] {
    if (bars.length === 0) {
      return [];
    }

    const { maPeriods, macd, rsiPeriods, kdj, bollinger, volumeMaPeriods } = this.config;

    const closes = bars.map((b) => new Big(b.close));
    const highs = bars.map((b) => new Big(b.high));
    const lows = bars.map((b) => new Big(b.low));
    const volumes = bars.map((b) => new Big(b.volume));

    const maSeries = seriesByPeriod(maPeriods, (period) => calculateSMA(closes, period));
    const rsiSeries = seriesByPeriod(rsiPeriods, (period) => calculateRSI(closes, period));
    const volumeSeries = seriesByPeriod(volumeMaPeriods, (period) =>
      calculateVolumeMA(volumes, period)
    );
    const macdSeries = calculateMACD(closes, macd.fast, macd.slow, macd.signal);
    const kdjSeries = calculateKDJ(highs, lows, closes, kdj.length, kdj.signal);
    const bollingerSeries = calculateBollinger(closes, bollinger.length, bollinger.std);

    const points = bars.map((bar, i) => ({
      date: bar.date,
      close: closes[i],
      ma: pickAt(maSeries, i),
      macd: macdSeries[i],
      rsi: pickAt(rsiSeries, i),
      kdj: kdjSeries[i],
      bollinger: bollingerSeries[i],
      volumeMa: pickAt(volumeSeries, i),
    }));

    this.logger.debug('지표 계산 완료', {
      code: bars[bars.length - 1].code,
      bars: bars.length,
      from: bars[0].date,
      to: bars[bars.length - 1].date,
    });

    return points;
  }
}

function seriesByPeriod(
  periods: readonly number[],
  calculate: (period: number) => IndicatorValue[]
): Map<number, IndicatorValue[]> {
  const series = new Map<number, IndicatorValue[]>();
  for (const period of periods) {
    if (!series.has(period)) {
      series.set(period, calculate(period));
    }
  }
  return series;
}

function pickAt(series: Map<number, IndicatorValue[]>, index: number): Record<number, IndicatorValue> {
  const result: Record<number, IndicatorValue> = {};
  for (const [period, values] of series) {
    result[period] = values[index] ?? null;
  }
  return result;
}

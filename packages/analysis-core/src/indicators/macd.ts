import type Big from 'big.js';
import type { IndicatorValue, MACDPoint } from '../types.js';
import { combine, ewm, spanToAlpha } from './utils.js';

/**
 * 지수 이동평균 (EMA) 시계열 계산
 *
 * 평활 계수 2 / (span + 1), 첫 관측값으로 시드한다.
 *
 * @param values - 값 배열 (null 허용)
 * @param span - EMA 기간
 */
export function calculateEMA(values: readonly IndicatorValue[], span: number): IndicatorValue[] {
  return ewm(values, spanToAlpha(span));
}

/**
 * MACD 시계열 계산
 *
 * DIF = EMA(fast) - EMA(slow)
 * DEA = EMA(DIF, signal)
 * Histogram = 2 × (DIF - DEA)
 *
 * 첫 봉부터 값이 존재한다 (시드 방식 때문에 초반 값은 안정화 전).
 *
 * @param closes - 종가 배열
 * @param fastPeriod - 빠른 EMA 기간 (기본값: 12)
 * @param slowPeriod - 느린 EMA 기간 (기본값: 26)
 * @param signalPeriod - 시그널선 기간 (기본값: 9)
 * @returns 입력과 1:1 정렬된 MACD 포인트
 *
 * @example
 * ```typescript
 * const macd = calculateMACD(closes);
 * const latest = macd[macd.length - 1];
 * if (latest.histogram?.gt(0)) {
 *   console.log('상승 모멘텀');
 * }
 * ```
 */
export function calculateMACD(
  closes: readonly Big[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9
): MACDPoint[] {
  const fastEMA = calculateEMA(closes, fastPeriod);
  const slowEMA = calculateEMA(closes, slowPeriod);

  const difs = fastEMA.map((fast, i) => combine(fast, slowEMA[i], (f, s) => f.minus(s)));
  const deas = calculateEMA(difs, signalPeriod);

  return difs.map((dif, i) => {
    const dea = deas[i];
    return {
      dif,
      dea,
      histogram: combine(dif, dea, (a, b) => a.minus(b).times(2)),
    };
  });
}

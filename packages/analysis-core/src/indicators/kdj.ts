import Big from 'big.js';
import type { IndicatorValue, KDJPoint } from '../types.js';
import { combine, ewm, rollingExtreme } from './utils.js';

/**
 * RSV (Raw Stochastic Value) 시계열
 *
 * RSV = (close - 최저가_n) / (최고가_n - 최저가_n) × 100
 * 고가/저가 범위가 0이면 해당 봉은 null
 */
export function calculateRSV(
  highs: readonly Big[],
  lows: readonly Big[],
  closes: readonly Big[],
  length: number
): IndicatorValue[] {
  const highestHighs = rollingExtreme(highs, length, 'max');
  const lowestLows = rollingExtreme(lows, length, 'min');

  return closes.map((close, i) => {
    const highest = highestHighs[i];
    const lowest = lowestLows[i];
    if (highest === null || lowest === null) return null;

    const range = highest.minus(lowest);
    if (range.eq(0)) return null;

    return close.minus(lowest).div(range).times(100);
  });
}

/**
 * KDJ 시계열 계산
 *
 * K = EWM(RSV, alpha = 1 / signal)
 * D = EWM(K, alpha = 1 / signal)
 * J = 3K - 2D
 *
 * @param highs - 고가 배열
 * @param lows - 저가 배열
 * @param closes - 종가 배열
 * @param length - RSV 기간 (기본값: 9)
 * @param signal - 평활 기간 (기본값: 3)
 */
export function calculateKDJ(
  highs: readonly Big[],
  lows: readonly Big[],
  closes: readonly Big[],
  length = 9,
  signal = 3
): KDJPoint[] {
  const rsv = calculateRSV(highs, lows, closes, length);
  const alpha = new Big(1).div(signal);

  const ks = ewm(rsv, alpha);
  const ds = ewm(ks, alpha);

  return ks.map((k, i) => {
    const d = ds[i];
    return {
      k,
      d,
      j: combine(k, d, (kv, dv) => kv.times(3).minus(dv.times(2))),
    };
  });
}

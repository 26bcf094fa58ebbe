import type Big from 'big.js';
import type { IndicatorValue } from '../types.js';
import { rollingMean } from './utils.js';

/**
 * 단순 이동평균 (SMA) 시계열 계산
 *
 * MA_n[i] = mean(close[i - n + 1 .. i]), i < n - 1 이면 null
 *
 * @param closes - 종가 배열 (오름차순)
 * @param period - 이동평균 기간
 * @returns 입력과 1:1 정렬된 MA 값
 *
 * @example
 * ```typescript
 * const ma5 = calculateSMA(closes, 5);
 * const latest = ma5[ma5.length - 1]; // Big | null
 * ```
 */
export function calculateSMA(closes: readonly Big[], period: number): IndicatorValue[] {
  return rollingMean(closes, period);
}

/**
 * 여러 기간의 이동평균 계산
 *
 * @param closes - 종가 배열
 * @param periods - 이동평균 기간 배열 (예: [5, 10, 20])
 * @returns 기간별 MA 시계열 맵
 */
export function calculateMultipleSMA(
  closes: readonly Big[],
  periods: readonly number[]
): Record<number, IndicatorValue[]> {
  const result: Record<number, IndicatorValue[]> = {};

  for (const period of periods) {
    result[period] = calculateSMA(closes, period);
  }

  return result;
}

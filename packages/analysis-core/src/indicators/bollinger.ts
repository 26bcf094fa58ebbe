import type Big from 'big.js';
import type { BollingerPoint } from '../types.js';
import { combine, rollingMean, rollingSampleStd } from './utils.js';

/**
 * 볼린저 밴드 시계열 계산
 *
 * middle = MA_n(close), band = k × 표본 표준편차(close, n)
 *
 * @param closes - 종가 배열
 * @param length - 기간 (기본값: 20)
 * @param multiplier - 표준편차 배수 (기본값: 2)
 */
export function calculateBollinger(
  closes: readonly Big[],
  length = 20,
  multiplier = 2
): BollingerPoint[] {
  const middles = rollingMean(closes, length);
  const stds = rollingSampleStd(closes, length);

  return middles.map((middle, i) => {
    const band = stds[i]?.times(multiplier) ?? null;
    return {
      upper: combine(middle, band, (m, b) => m.plus(b)),
      middle,
      lower: combine(middle, band, (m, b) => m.minus(b)),
    };
  });
}

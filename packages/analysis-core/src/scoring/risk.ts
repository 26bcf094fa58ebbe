import Big from 'big.js';
import type { Bar, RiskLevel } from '../types.js';

/**
 * 일간 수익률 (종가 변화율) 계산
 *
 * 전일 종가가 0이면 해당 수익률은 건너뛴다.
 *
 * @param bars - Bar 배열 (오름차순)
 * @returns 길이 최대 bars.length - 1 의 수익률 배열
 */
export function calculateDailyReturns(bars: readonly Pick<Bar, 'close'>[]): number[] {
  const returns: number[] = [];

  for (let i = 1; i < bars.length; i++) {
    const prev = new Big(bars[i - 1].close);
    if (prev.eq(0)) continue;

    returns.push(new Big(bars[i].close).minus(prev).div(prev).toNumber());
  }

  return returns;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * 표준편차
 *
 * @param values - 표본
 * @param ddof - 자유도 보정 (표본 표준편차 1, 모표준편차 0)
 * @returns 표본이 부족하면 null
 */
export function standardDeviation(values: readonly number[], ddof: 0 | 1): number | null {
  if (values.length - ddof <= 0) return null;

  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0);
  return Math.sqrt(squared / (values.length - ddof));
}

/**
 * 연율화 변동성 = 일간 수익률 표본 표준편차 × sqrt(거래일수)
 *
 * @returns 수익률이 2개 미만이면 null
 */
export function calculateAnnualizedVolatility(
  bars: readonly Pick<Bar, 'close'>[],
  tradingDaysPerYear = 252
): number | null {
  const std = standardDeviation(calculateDailyReturns(bars), 1);
  if (std === null) return null;
  return std * Math.sqrt(tradingDaysPerYear);
}

/**
 * 변동성 → 위험 등급
 *
 * 변동성을 계산할 수 없으면 high로 본다.
 */
export function classifyRisk(
  volatility: number | null,
  bands: { low: number; medium: number } = { low: 0.2, medium: 0.4 }
): RiskLevel {
  if (volatility === null) return 'high';
  if (volatility < bands.low) return 'low';
  if (volatility < bands.medium) return 'medium';
  return 'high';
}

/**
 * 기대 수익률 = 최근 window개 일간 수익률 평균 × 거래일수
 */
export function estimateExpectedReturn(
  bars: readonly Pick<Bar, 'close'>[],
  window = 30,
  tradingDaysPerYear = 252
): number {
  const recent = calculateDailyReturns(bars).slice(-window);
  if (recent.length === 0) return 0;
  return mean(recent) * tradingDaysPerYear;
}

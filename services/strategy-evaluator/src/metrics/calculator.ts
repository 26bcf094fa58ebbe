import Big from 'big.js';
import { mean, standardDeviation } from '@signal-lab/analysis-core';
import type { JoinedPoint, TradeStats } from '../types.js';

/**
 * 총 수익률 = 마지막 종가 / 첫 종가 - 1
 *
 * @returns 첫 종가가 0 이하이면 0
 */
export function calculateTotalReturn(firstClose: number, lastClose: number): number {
  const first = new Big(firstClose);
  if (first.lte(0)) {
    return 0;
  }

  return new Big(lastClose).div(first).minus(1).toNumber();
}

/**
 * 연율화 수익률 = (1 + 총 수익률)^(daysPerYear / 달력 일수) - 1
 *
 * @param totalReturn - 총 수익률
 * @param calendarDays - 평가 구간 달력 일수
 * @param daysPerYear - 연간 일수 (기본값: 365)
 * @returns 일수가 0 이하이면 0
 */
export function calculateAnnualReturn(
  totalReturn: number,
  calendarDays: number,
  daysPerYear = 365
): number {
  if (calendarDays <= 0) {
    return 0;
  }

  return Math.pow(1 + totalReturn, daysPerYear / calendarDays) - 1;
}

/**
 * 최대 낙폭 (Max Drawdown) 계산
 *
 * 첫 종가 기준 누적 수익률 곡선에서
 * drawdown_t = (누적 최고치_t - 누적 수익률_t) / (1 + 누적 최고치_t)
 *
 * @param closes - 종가 배열 (오름차순)
 * @returns 최대 낙폭 (0 ~ 1)
 */
export function calculateMaxDrawdown(closes: readonly number[]): number {
  if (closes.length === 0) {
    return 0;
  }

  const base = new Big(closes[0]);
  if (base.lte(0)) {
    return 0;
  }

  let peak = new Big(0);
  let maxDrawdown = new Big(0);

  for (const close of closes) {
    const cumulative = new Big(close).div(base).minus(1);
    if (cumulative.gt(peak)) {
      peak = cumulative;
    }

    const drawdown = peak.minus(cumulative).div(peak.plus(1));
    if (drawdown.gt(maxDrawdown)) {
      maxDrawdown = drawdown;
    }
  }

  return maxDrawdown.toNumber();
}

/**
 * Sharpe Ratio 계산
 *
 * Sharpe = (평균 일간 수익률 - 무위험 수익률 / 거래일수) / 표준편차 × sqrt(거래일수)
 * 표준편차는 모표준편차 (분모 n)
 *
 * @param dailyReturns - 여러 종목의 일간 수익률을 합친 표본
 * @param riskFreeRate - 연간 무위험 수익률 (기본값: 0.03)
 * @param tradingDaysPerYear - 연간 거래일수 (기본값: 252)
 * @returns 관측치 2개 미만 또는 표준편차 0이면 0
 */
export function calculateSharpeRatio(
  dailyReturns: readonly number[],
  riskFreeRate = 0.03,
  tradingDaysPerYear = 252
): number {
  if (dailyReturns.length < 2) {
    return 0;
  }

  const stdDev = standardDeviation(dailyReturns, 0);
  if (stdDev === null || stdDev === 0) {
    return 0;
  }

  const excess = mean(dailyReturns) - riskFreeRate / tradingDaysPerYear;
  return (excess / stdDev) * Math.sqrt(tradingDaysPerYear);
}

/**
 * 보유 수익률 추출
 *
 * 연속한 두 포인트 중 앞 포인트 등급이 buy인 경우만 거래로 본다.
 * 보유 수익률 = (다음 종가 - 현재 종가) / 현재 종가
 */
export function extractHoldingReturns(points: readonly JoinedPoint[]): number[] {
  const returns: number[] = [];

  for (let i = 0; i < points.length - 1; i++) {
    const current = points[i];
    if (current.rating !== 'buy') continue;

    const entry = new Big(current.close);
    if (entry.lte(0)) continue;

    returns.push(new Big(points[i + 1].close).minus(entry).div(entry).toNumber());
  }

  return returns;
}

/**
 * 승률 / 손익비 계산
 *
 * - 승률 = 수익 거래 / 전체 거래
 * - 손익비 = 평균 수익 / 평균 손실(절댓값), 수익 또는 손실 거래가 없으면 0
 * - 수익률 0인 거래는 승/패 어느 쪽에도 넣지 않는다
 */
export function calculateTradeStats(holdingReturns: readonly number[]): TradeStats {
  const gains = holdingReturns.filter((r) => r > 0);
  const losses = holdingReturns.filter((r) => r < 0).map((r) => Math.abs(r));

  const trades = holdingReturns.length;
  const winRate = trades === 0 ? 0 : gains.length / trades;
  const avgLoss = mean(losses);
  const profitLossRatio =
    gains.length === 0 || losses.length === 0 || avgLoss === 0 ? 0 : mean(gains) / avgLoss;

  return {
    trades,
    wins: gains.length,
    losses: losses.length,
    winRate,
    profitLossRatio,
  };
}

import Big from 'big.js';
import type { IndicatorValue } from '../types.js';
import { rollingMean } from './utils.js';

const HUNDRED = new Big(100);

/**
 * RSI (Relative Strength Index) 시계열 계산
 *
 * - 봉별 상승폭 = max(Δclose, 0), 하락폭 = max(-Δclose, 0)
 * - 첫 봉의 Δclose는 0으로 본다
 * - 상승/하락폭의 단순 이동평균으로 RSI = 100 - 100 / (1 + avgGain / avgLoss)
 *
 * 분모가 0인 경우 예외 대신 포화값을 쓴다:
 * - avgLoss = 0 → 100 (윈도우 내 하락 없음, 보합 포함)
 * - avgGain = 0 → 0
 *
 * @param closes - 종가 배열
 * @param period - RSI 기간
 * @returns 입력과 1:1 정렬된 RSI, 처음 period - 1개는 null
 */
export function calculateRSI(closes: readonly Big[], period = 14): IndicatorValue[] {
  const gains: Big[] = [];
  const losses: Big[] = [];

  for (let i = 0; i < closes.length; i++) {
    const change = i === 0 ? new Big(0) : closes[i].minus(closes[i - 1]);
    gains.push(change.gt(0) ? change : new Big(0));
    losses.push(change.lt(0) ? change.abs() : new Big(0));
  }

  const avgGains = rollingMean(gains, period);
  const avgLosses = rollingMean(losses, period);

  return avgGains.map((avgGain, i) => {
    const avgLoss = avgLosses[i];
    if (avgGain === null || avgLoss === null) return null;

    if (avgLoss.eq(0)) return HUNDRED;
    if (avgGain.eq(0)) return new Big(0);

    const rs = avgGain.div(avgLoss);
    return HUNDRED.minus(HUNDRED.div(rs.plus(1)));
  });
}

/**
 * 과매수/과매도 판정
 */
export function classifyRSI(
  value: Big,
  oversold = 30,
  overbought = 70
): 'oversold' | 'overbought' | 'neutral' {
  if (value.lt(oversold)) return 'oversold';
  if (value.gt(overbought)) return 'overbought';
  return 'neutral';
}

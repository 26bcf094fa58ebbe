import type { IndicatorValue, Signal } from '../types.js';

export type CrossoverResult =
  | { status: 'ok'; signal: Signal }
  | { status: 'undefined'; detail: string };

/**
 * 두 선의 교차 판정 (직전 포인트 → 최신 포인트)
 *
 * - 골든크로스: 이전에 fast < slow, 현재 fast > slow → buy
 * - 데드크로스: 이전에 fast > slow, 현재 fast < slow → sell
 * - 그 외 (접촉만 하거나 변화 없음) → hold
 *
 * @param previous - 직전 포인트의 [fast, slow]
 * @param latest - 최신 포인트의 [fast, slow]
 *
 * @example
 * ```typescript
 * const result = detectCrossover([prev.macd.dif, prev.macd.dea], [last.macd.dif, last.macd.dea]);
 * if (result.status === 'ok' && result.signal === 'buy') {
 *   console.log('MACD 골든크로스');
 * }
 * ```
 */
export function detectCrossover(
  previous: readonly [IndicatorValue, IndicatorValue],
  latest: readonly [IndicatorValue, IndicatorValue]
): CrossoverResult {
  const [prevFast, prevSlow] = previous;
  const [lastFast, lastSlow] = latest;

  if (prevFast === null || prevSlow === null || lastFast === null || lastSlow === null) {
    return { status: 'undefined', detail: '교차 판정에 필요한 지표 값이 아직 없음' };
  }

  if (prevFast.lt(prevSlow) && lastFast.gt(lastSlow)) {
    return { status: 'ok', signal: 'buy' };
  }

  if (prevFast.gt(prevSlow) && lastFast.lt(lastSlow)) {
    return { status: 'ok', signal: 'sell' };
  }

  return { status: 'ok', signal: 'hold' };
}

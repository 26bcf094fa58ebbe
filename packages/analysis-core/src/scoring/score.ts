import { SIGNAL_FAMILIES, type Rating, type SignalFamily, type SignalSet } from '../types.js';

/**
 * 복합 점수 계산
 *
 * 기준점(50)에서 시작하여 buy면 가중치를 더하고 sell이면 뺀다.
 * 결과는 [0, 100]으로 고정한 뒤 정수로 반올림한다.
 *
 * @param signals - 계열별 시그널
 * @param weights - 계열별 가중치
 * @param baseline - 기준점 (기본값: 50)
 * @returns 0-100 정수 점수
 *
 * @example
 * ```typescript
 * const score = calculateCompositeScore(
 *   { macd: 'buy', rsi: 'hold', kdj: 'buy', bollinger: 'hold', ma: 'hold' },
 *   { macd: 25, rsi: 20, kdj: 20, bollinger: 15, ma: 20 }
 * );
 * // 50 + 25 + 20 = 95
 * ```
 */
export function calculateCompositeScore(
  signals: Readonly<SignalSet>,
  weights: Readonly<Record<SignalFamily, number>>,
  baseline = 50
): number {
  let score = baseline;

  for (const family of SIGNAL_FAMILIES) {
    const signal = signals[family];
    if (signal === 'buy') {
      score += weights[family];
    } else if (signal === 'sell') {
      score -= weights[family];
    }
  }

  return Math.round(Math.max(0, Math.min(100, score)));
}

/**
 * 점수 → 투자 등급
 *
 * score >= buyThreshold → buy, score <= sellThreshold → sell, 그 외 hold
 */
export function determineRating(score: number, buyThreshold = 70, sellThreshold = 30): Rating {
  if (score >= buyThreshold) return 'buy';
  if (score <= sellThreshold) return 'sell';
  return 'hold';
}

import Big from 'big.js';
import type { IndicatorValue } from '../types.js';

/**
 * 이동 윈도우 산술 평균
 *
 * 누적 합을 밀어가며 계산한다 (Big 덧셈/뺄셈은 오차가 없음).
 *
 * @param values - 값 배열
 * @param period - 윈도우 크기
 * @returns 입력과 같은 길이의 배열, 처음 period - 1개는 null
 */
export function rollingMean(values: readonly Big[], period: number): IndicatorValue[] {
  const result: IndicatorValue[] = [];
  let sum = new Big(0);

  for (let i = 0; i < values.length; i++) {
    sum = sum.plus(values[i]);
    if (i >= period) {
      sum = sum.minus(values[i - period]);
    }
    result.push(i >= period - 1 ? sum.div(period) : null);
  }

  return result;
}

/**
 * 이동 윈도우 표본 표준편차 (분모 n - 1)
 */
export function rollingSampleStd(values: readonly Big[], period: number): IndicatorValue[] {
  const result: IndicatorValue[] = [];

  for (let i = 0; i < values.length; i++) {
    if (period < 2 || i < period - 1) {
      result.push(null);
      continue;
    }

    const window = values.slice(i - period + 1, i + 1);
    const mean = window.reduce((acc, v) => acc.plus(v), new Big(0)).div(period);
    const squared = window.reduce((acc, v) => acc.plus(v.minus(mean).pow(2)), new Big(0));
    result.push(squared.div(period - 1).sqrt());
  }

  return result;
}

/**
 * 이동 윈도우 최댓값/최솟값
 */
export function rollingExtreme(
  values: readonly Big[],
  period: number,
  mode: 'max' | 'min'
): IndicatorValue[] {
  const result: IndicatorValue[] = [];

  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      result.push(null);
      continue;
    }

    let extreme = values[i - period + 1];
    for (let j = i - period + 2; j <= i; j++) {
      const value = values[j];
      if (mode === 'max' ? value.gt(extreme) : value.lt(extreme)) {
        extreme = value;
      }
    }
    result.push(extreme);
  }

  return result;
}

/**
 * 지수 가중 평활 (재귀식, 초기값 편향 보정 없음)
 *
 * - 첫 관측값으로 시드한다 (SMA 시드 아님)
 * - y_t = (1 - alpha) * y_{t-1} + alpha * x_t
 * - 중간에 null이 나오면 직전 값을 유지하고, 다음 관측값을 섞을 때
 *   누락된 봉 수만큼 이전 가중치를 (1 - alpha)로 추가 감쇠한다
 *
 * @param values - 입력 시계열 (null 허용)
 * @param alpha - 평활 계수 (0 < alpha <= 1)
 * @returns 평활 결과, 첫 관측값 이전은 null
 */
export function ewm(values: readonly IndicatorValue[], alpha: Big): IndicatorValue[] {
  const decay = new Big(1).minus(alpha);
  const result: IndicatorValue[] = [];

  let weighted: Big | null = null;
  let oldWeight = new Big(1);

  for (const value of values) {
    if (weighted === null) {
      if (value !== null) {
        weighted = value;
        oldWeight = new Big(1);
      }
    } else {
      oldWeight = oldWeight.times(decay);
      if (value !== null) {
        weighted = oldWeight.times(weighted).plus(alpha.times(value)).div(oldWeight.plus(alpha));
        oldWeight = new Big(1);
      }
    }
    result.push(weighted);
  }

  return result;
}

/**
 * span 기반 EMA 평활 계수: 2 / (span + 1)
 */
export function spanToAlpha(span: number): Big {
  return new Big(2).div(span + 1);
}

/**
 * 두 지표 값 중 하나라도 null이면 null
 */
export function combine(
  a: IndicatorValue,
  b: IndicatorValue,
  fn: (a: Big, b: Big) => Big
): IndicatorValue {
  if (a === null || b === null) return null;
  return fn(a, b);
}

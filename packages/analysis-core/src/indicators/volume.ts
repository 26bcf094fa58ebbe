import type Big from 'big.js';
import type { IndicatorValue } from '../types.js';
import { rollingMean } from './utils.js';

/**
 * 거래량 이동평균 계산
 *
 * @param volumes - 거래량 배열 (오름차순)
 * @param period - 평균 기간
 * @returns 입력과 1:1 정렬된 거래량 MA, 처음 period - 1개는 null
 */
export function calculateVolumeMA(volumes: readonly Big[], period: number): IndicatorValue[] {
  return rollingMean(volumes, period);
}

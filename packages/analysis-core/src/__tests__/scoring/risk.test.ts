import { describe, it, expect } from 'vitest';
import {
  calculateAnnualizedVolatility,
  calculateDailyReturns,
  classifyRisk,
  estimateExpectedReturn,
  standardDeviation,
} from '../../scoring/risk.js';

const bars = (closes: number[]) => closes.map((close) => ({ close }));

describe('calculateDailyReturns', () => {
  it('종가 변화율을 계산해야 함', () => {
    expect(calculateDailyReturns(bars([100, 110, 99]))).toEqual([0.1, -0.1]);
  });

  it('전일 종가가 0이면 건너뛰어야 함', () => {
    expect(calculateDailyReturns(bars([0, 10, 20]))).toEqual([1]);
  });
});

describe('standardDeviation', () => {
  it('ddof에 따라 분모를 바꿔야 함', () => {
    expect(standardDeviation([1, 2, 3, 4], 0)).toBeCloseTo(Math.sqrt(1.25), 12);
    expect(standardDeviation([1, 2, 3, 4], 1)).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it('표본이 부족하면 null이어야 함', () => {
    expect(standardDeviation([1], 1)).toBeNull();
    expect(standardDeviation([], 0)).toBeNull();
  });
});

describe('calculateAnnualizedVolatility', () => {
  it('수익률이 2개 미만이면 null이어야 함', () => {
    expect(calculateAnnualizedVolatility(bars([100, 101]))).toBeNull();
  });

  it('보합이면 0이어야 함', () => {
    expect(calculateAnnualizedVolatility(bars([100, 100, 100, 100]))).toBe(0);
  });
});

describe('classifyRisk', () => {
  it('구간 경계를 적용해야 함', () => {
    expect(classifyRisk(0.19)).toBe('low');
    expect(classifyRisk(0.2)).toBe('medium');
    expect(classifyRisk(0.39)).toBe('medium');
    expect(classifyRisk(0.4)).toBe('high');
  });

  it('변동성을 계산할 수 없으면 high여야 함', () => {
    expect(classifyRisk(null)).toBe('high');
  });
});

describe('estimateExpectedReturn', () => {
  it('최근 일간 수익률 평균 × 252 이어야 함', () => {
    expect(estimateExpectedReturn(bars([100, 101]))).toBeCloseTo(2.52, 10);
  });

  it('최근 window개 수익률만 사용해야 함', () => {
    // 수익률: -0.5, 0.02, 0.02 → 최근 2개만
    expect(estimateExpectedReturn(bars([200, 100, 102, 104.04]), 2, 252)).toBeCloseTo(5.04, 10);
  });

  it('수익률이 없으면 0이어야 함', () => {
    expect(estimateExpectedReturn(bars([100]))).toBe(0);
  });
});

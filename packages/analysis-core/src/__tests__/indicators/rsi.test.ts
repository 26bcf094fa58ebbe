import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { calculateRSI, classifyRSI } from '../../indicators/rsi.js';
import { alternatingCloses } from '../helpers.js';

const toBig = (values: number[]) => values.map((v) => new Big(v));

describe('calculateRSI', () => {
  it('기간 미만 구간은 null이어야 함', () => {
    const result = calculateRSI(toBig([1, 2, 1, 2, 3]), 3);

    expect(result[0]).toBeNull();
    expect(result[1]).toBeNull();
    expect(result[2]).not.toBeNull();
  });

  it('첫 봉의 변화량은 0으로 보고 평균을 내야 함', () => {
    // 변화량 [0, +1, -1] → 평균 상승 1/3, 평균 하락 1/3
    const result = calculateRSI(toBig([1, 2, 1]), 3);

    expect(result[2]?.toNumber()).toBe(50);
  });

  it('윈도우 내 하락이 없으면 100이어야 함', () => {
    const rising = calculateRSI(toBig([10, 11, 12, 12, 13, 14, 15]), 3);

    rising.slice(2).forEach((v) => expect(v?.toNumber()).toBe(100));
  });

  it('보합이어도 하락이 없으므로 100이어야 함', () => {
    const result = calculateRSI(toBig(Array(10).fill(100)), 5);

    expect(result[9]?.toNumber()).toBe(100);
  });

  it('윈도우 내 상승이 없으면 0이어야 함', () => {
    const result = calculateRSI(toBig([20, 19, 18, 17, 16]), 3);

    expect(result[4]?.toNumber()).toBe(0);
  });

  it('정의된 값은 항상 0-100 범위여야 함', () => {
    const closes = toBig(alternatingCloses(80).map((c, i) => c * (1 + Math.sin(i) / 20)));

    for (const period of [6, 12, 14, 24]) {
      for (const value of calculateRSI(closes, period)) {
        if (value === null) continue;
        expect(value.gte(0) && value.lte(100)).toBe(true);
      }
    }
  });
});

describe('classifyRSI', () => {
  it('임계값 자체는 중립이어야 함', () => {
    expect(classifyRSI(new Big(29.9))).toBe('oversold');
    expect(classifyRSI(new Big(30))).toBe('neutral');
    expect(classifyRSI(new Big(70))).toBe('neutral');
    expect(classifyRSI(new Big(70.1))).toBe('overbought');
  });

  it('사용자 정의 임계값을 적용해야 함', () => {
    expect(classifyRSI(new Big(25), 20, 80)).toBe('neutral');
    expect(classifyRSI(new Big(85), 20, 80)).toBe('overbought');
  });
});

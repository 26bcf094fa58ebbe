import { describe, it, expect } from 'vitest';
import {
  calculateAnnualReturn,
  calculateMaxDrawdown,
  calculateSharpeRatio,
  calculateTotalReturn,
  calculateTradeStats,
  extractHoldingReturns,
} from './calculator.js';
import type { JoinedPoint } from '../types.js';

describe('성과 지표 계산', () => {
  describe('calculateTotalReturn', () => {
    it('수익률 계산', () => {
      expect(calculateTotalReturn(100, 110)).toBe(0.1);
    });

    it('손실률 계산', () => {
      expect(calculateTotalReturn(100, 80)).toBe(-0.2);
    });

    it('첫 종가가 0이면 0', () => {
      expect(calculateTotalReturn(0, 10)).toBe(0);
    });
  });

  describe('calculateAnnualReturn', () => {
    it('1년 구간이면 총 수익률과 같음', () => {
      expect(calculateAnnualReturn(0.1, 365)).toBeCloseTo(0.1, 12);
    });

    it('2년 구간은 연 복리로 환산', () => {
      // 1.21^(1/2) - 1
      expect(calculateAnnualReturn(0.21, 730)).toBeCloseTo(0.1, 12);
    });

    it('일수가 0 이하이면 0', () => {
      expect(calculateAnnualReturn(0.1, 0)).toBe(0);
      expect(calculateAnnualReturn(0.1, -3)).toBe(0);
    });
  });

  describe('calculateMaxDrawdown', () => {
    it('최대 낙폭 계산', () => {
      // 누적 수익률 0, 0.2, -0.1, 0.3 → (0.2 - (-0.1)) / 1.2
      expect(calculateMaxDrawdown([100, 120, 90, 130])).toBe(0.25);
    });

    it('시작가 아래로 하락하면 시작점 기준 낙폭', () => {
      expect(calculateMaxDrawdown([100, 80, 90])).toBe(0.2);
    });

    it('상승장에서 낙폭 0', () => {
      expect(calculateMaxDrawdown([100, 110, 120])).toBe(0);
    });

    it('빈 입력이면 0', () => {
      expect(calculateMaxDrawdown([])).toBe(0);
    });
  });

  describe('calculateSharpeRatio', () => {
    it('무위험 수익률을 뺀 초과 수익 / 모표준편차 × sqrt(252)', () => {
      const returns = [0.01, -0.01, 0.02, 0];
      // 평균 0.005, 모분산 1.25e-4
      const expected = ((0.005 - 0.03 / 252) / Math.sqrt(1.25e-4)) * Math.sqrt(252);

      expect(calculateSharpeRatio(returns)).toBeCloseTo(expected, 10);
    });

    it('관측치가 2개 미만이면 0', () => {
      expect(calculateSharpeRatio([0.1])).toBe(0);
      expect(calculateSharpeRatio([])).toBe(0);
    });

    it('표준편차가 0이면 0', () => {
      expect(calculateSharpeRatio([0.5, 0.5, 0.5])).toBe(0);
    });
  });

  describe('extractHoldingReturns', () => {
    it('앞 포인트가 buy인 구간만 거래로 계산', () => {
      const points: JoinedPoint[] = [
        { date: '2024-01-01', rating: 'buy', close: 100 },
        { date: '2024-01-02', rating: 'hold', close: 110 },
        { date: '2024-01-03', rating: 'buy', close: 110 },
        { date: '2024-01-04', rating: 'sell', close: 99 },
      ];

      expect(extractHoldingReturns(points)).toEqual([0.1, -0.1]);
    });

    it('마지막 포인트의 buy는 거래가 아님', () => {
      const points: JoinedPoint[] = [
        { date: '2024-01-01', rating: 'hold', close: 100 },
        { date: '2024-01-02', rating: 'buy', close: 110 },
      ];

      expect(extractHoldingReturns(points)).toEqual([]);
    });
  });

  describe('calculateTradeStats', () => {
    it('승률 / 손익비 계산', () => {
      const stats = calculateTradeStats([0.1, -0.05, 0.2, 0]);

      expect(stats.trades).toBe(4);
      expect(stats.wins).toBe(2);
      expect(stats.losses).toBe(1);
      expect(stats.winRate).toBe(0.5);
      // 평균 수익 0.15 / 평균 손실 0.05
      expect(stats.profitLossRatio).toBeCloseTo(3, 10);
    });

    it('손실 거래가 없으면 손익비 0', () => {
      const stats = calculateTradeStats([0.1, 0.2]);

      expect(stats.winRate).toBe(1);
      expect(stats.profitLossRatio).toBe(0);
    });

    it('거래가 없으면 모두 0', () => {
      expect(calculateTradeStats([])).toEqual({
        trades: 0,
        wins: 0,
        losses: 0,
        winRate: 0,
        profitLossRatio: 0,
      });
    });
  });
});

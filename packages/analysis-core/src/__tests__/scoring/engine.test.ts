import { describe, it, expect } from 'vitest';
import { ScoringEngine } from '../../scoring/engine.js';
import { InsufficientHistoryError, InvalidConfigError } from '../../errors.js';
import type { SignalSet } from '../../types.js';
import { createBars, createTestLogger } from '../helpers.js';

const HOLD: SignalSet = { macd: 'hold', rsi: 'hold', kdj: 'hold', bollinger: 'hold', ma: 'hold' };

describe('ScoringEngine', () => {
  const engine = new ScoringEngine({ logger: createTestLogger() });

  it('Bar가 26개 미만이면 InsufficientHistoryError를 던져야 함', () => {
    const bars = createBars(Array.from({ length: 25 }, (_, i) => 100 + i));

    expect(() => engine.score({ bars, signals: HOLD, strategy: 'technical_composite' })).toThrow(
      InsufficientHistoryError
    );

    try {
      engine.assertSufficientHistory(bars);
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientHistoryError);
      if (error instanceof InsufficientHistoryError) {
        expect(error.required).toBe(26);
        expect(error.actual).toBe(25);
        expect(error.code).toBe('sh.600000');
      }
    }
  });

  it('마지막 Bar 기준으로 AnalysisResult를 만들어야 함', () => {
    const bars = createBars(Array.from({ length: 26 }, (_, i) => 100 + i), 'sz.000001');
    const signals: SignalSet = { ...HOLD, macd: 'buy' };

    const result = engine.score({ bars, signals, strategy: 'momentum' });

    expect(result.code).toBe('sz.000001');
    expect(result.analysisDate).toBe(bars[25].date);
    expect(result.strategy).toBe('momentum');
    expect(result.score).toBe(75);
    expect(result.rating).toBe('buy');
    expect(result.signals).toEqual(signals);
    expect(result.signals).not.toBe(signals);
    expect(result.expectedReturn).toBeGreaterThan(0);
  });

  it('보합 이력은 low 위험, 기대 수익률 0이어야 함', () => {
    const result = engine.score({
      bars: createBars(Array(30).fill(50)),
      signals: HOLD,
      strategy: 'technical_composite',
    });

    expect(result.riskLevel).toBe('low');
    expect(result.expectedReturn).toBe(0);
    expect(result.rating).toBe('hold');
  });

  it('사용자 정의 가중치를 적용하고 결과를 고정해야 함', () => {
    const custom = new ScoringEngine({ config: { weights: { macd: 60 } }, logger: createTestLogger() });

    expect(custom.calculateScore({ ...HOLD, macd: 'buy' })).toBe(100);
    expect(custom.calculateScore({ ...HOLD, macd: 'sell' })).toBe(0);
  });

  it('sellThreshold >= buyThreshold 설정은 거부해야 함', () => {
    expect(() => new ScoringEngine({ config: { sellThreshold: 80 } })).toThrow(InvalidConfigError);
  });
});

import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { SignalEngine } from '../../signals/engine.js';
import { InvalidConfigError } from '../../errors.js';
import type { IndicatorPoint } from '../../types.js';
import { createTestLogger } from '../helpers.js';

function createPoint(date: string, close: number, overrides: Partial<IndicatorPoint> = {}): IndicatorPoint {
  return {
    date,
    close: new Big(close),
    ma: {},
    macd: { dif: null, dea: null, histogram: null },
    rsi: {},
    kdj: { k: null, d: null, j: null },
    bollinger: { upper: null, middle: null, lower: null },
    volumeMa: {},
    ...overrides,
  };
}

const line = (fast: number, slow: number) => ({ dif: new Big(fast), dea: new Big(slow), histogram: null });

describe('SignalEngine', () => {
  const engine = new SignalEngine({ logger: createTestLogger() });

  it('포인트가 없어도 예외 없이 모두 hold여야 함', () => {
    const { signals, diagnostics } = engine.evaluate([]);

    expect(signals).toEqual({ macd: 'hold', rsi: 'hold', kdj: 'hold', bollinger: 'hold', ma: 'hold' });
    expect(diagnostics.filter((d) => d.reason === 'INSUFFICIENT_HISTORY')).toHaveLength(5);
  });

  it('포인트가 1개면 교차 계열에 INSUFFICIENT_HISTORY 진단을 남겨야 함', () => {
    const { diagnostics } = engine.evaluate([createPoint('2024-01-01', 10)]);

    const insufficient = diagnostics.filter((d) => d.reason === 'INSUFFICIENT_HISTORY').map((d) => d.family);
    expect(insufficient.sort()).toEqual(['kdj', 'ma', 'macd']);
  });

  it('MA 골든크로스는 buy여야 함', () => {
    const { signals } = engine.evaluate([
      createPoint('2024-01-01', 10, { ma: { 5: new Big(9), 20: new Big(10) } }),
      createPoint('2024-01-02', 12, { ma: { 5: new Big(11), 20: new Big(10) } }),
    ]);

    expect(signals.ma).toBe('buy');
  });

  it('MACD 데드크로스는 sell이어야 함', () => {
    const { signals } = engine.evaluate([
      createPoint('2024-01-01', 10, { macd: line(1, 0.5) }),
      createPoint('2024-01-02', 9, { macd: line(0.2, 0.4) }),
    ]);

    expect(signals.macd).toBe('sell');
  });

  it('KDJ K가 D를 상향 돌파하면 buy여야 함', () => {
    const { signals } = engine.evaluate([
      createPoint('2024-01-01', 10, { kdj: { k: new Big(20), d: new Big(30), j: null } }),
      createPoint('2024-01-02', 11, { kdj: { k: new Big(35), d: new Big(30), j: null } }),
    ]);

    expect(signals.kdj).toBe('buy');
  });

  it('RSI 과매도는 buy, 과매수는 sell이어야 함', () => {
    expect(engine.evaluate([createPoint('2024-01-01', 10, { rsi: { 14: new Big(25) } })]).signals.rsi).toBe(
      'buy'
    );
    expect(engine.evaluate([createPoint('2024-01-01', 10, { rsi: { 14: new Big(75) } })]).signals.rsi).toBe(
      'sell'
    );
    expect(engine.evaluate([createPoint('2024-01-01', 10, { rsi: { 14: new Big(70) } })]).signals.rsi).toBe(
      'hold'
    );
  });

  it('RSI 값이 없으면 hold와 UNDEFINED_INDICATOR 진단이어야 함', () => {
    const { signals, diagnostics } = engine.evaluate([
      createPoint('2024-01-01', 10, { rsi: { 6: new Big(10) } }),
    ]);

    expect(signals.rsi).toBe('hold');
    expect(diagnostics).toContainEqual({
      family: 'rsi',
      reason: 'UNDEFINED_INDICATOR',
      detail: 'RSI14 값 없음',
    });
  });

  it('종가가 볼린저 상단을 넘으면 buy, 하단을 밑돌면 sell이어야 함', () => {
    const bands = { upper: new Big(110), middle: new Big(100), lower: new Big(90) };

    expect(engine.evaluate([createPoint('2024-01-01', 111, { bollinger: bands })]).signals.bollinger).toBe('buy');
    expect(engine.evaluate([createPoint('2024-01-01', 89, { bollinger: bands })]).signals.bollinger).toBe('sell');
    expect(engine.evaluate([createPoint('2024-01-01', 110, { bollinger: bands })]).signals.bollinger).toBe('hold');
  });

  it('설정한 RSI 기간과 MA 기간을 사용해야 함', () => {
    const custom = new SignalEngine({
      config: { ma: { short: 3, long: 7 }, rsiPeriod: 6 },
      logger: createTestLogger(),
    });

    expect(custom.requiredPeriods()).toEqual({ maPeriods: [3, 7], rsiPeriods: [6] });
    expect(custom.evaluate([createPoint('2024-01-01', 10, { rsi: { 6: new Big(80) } })]).signals.rsi).toBe('sell');
  });

  it('ma.short >= ma.long 설정은 거부해야 함', () => {
    expect(() => new SignalEngine({ config: { ma: { short: 20, long: 5 } } })).toThrow(InvalidConfigError);
  });
});

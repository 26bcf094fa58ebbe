import { describe, it, expect } from 'vitest';
import { TechnicalAnalyzer, DEFAULT_STRATEGY } from '../../analysis/analyzer.js';
import { InsufficientHistoryError, InvalidConfigError } from '../../errors.js';
import { alternatingCloses, createBars, createTestLogger } from '../helpers.js';

describe('TechnicalAnalyzer', () => {
  it('시그널 판정용 MA/RSI 기간을 지표 설정에 병합해야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });

    expect(analyzer.strategy).toBe(DEFAULT_STRATEGY);
    expect(analyzer.indicatorEngine.config.maPeriods).toEqual([5, 10, 20, 60, 120, 250]);
    expect(analyzer.indicatorEngine.config.rsiPeriods).toEqual([6, 12, 14, 24]);
  });

  it('사용자 정의 시그널 기간도 병합해야 함', () => {
    const analyzer = new TechnicalAnalyzer({
      indicators: { maPeriods: [10], rsiPeriods: [] },
      signals: { ma: { short: 3, long: 7 }, rsiPeriod: 9 },
      logger: createTestLogger(),
    });

    expect(analyzer.indicatorEngine.config.maPeriods).toEqual([3, 7, 10]);
    expect(analyzer.indicatorEngine.config.rsiPeriods).toEqual([9]);
  });

  it('빈 전략 식별자는 거부해야 함', () => {
    expect(() => new TechnicalAnalyzer({ strategy: '  ' })).toThrow(InvalidConfigError);
  });

  it('Bar가 26개 미만이면 결과 없이 예외를 던져야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });

    expect(() => analyzer.analyze(createBars(alternatingCloses(25)))).toThrow(InsufficientHistoryError);
  });

  it('±1% 교대 30봉에서도 예외 없이 유효한 결과를 내야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });
    const bars = createBars(alternatingCloses(30));

    const { result, points, diagnostics } = analyzer.analyzeDetailed(bars);

    expect(points).toHaveLength(30);
    expect(['buy', 'hold', 'sell']).toContain(result.rating);
    expect(Number.isInteger(result.score)).toBe(true);
    expect(result.score).toBeGreaterThanOrEqual(0);
    expect(result.score).toBeLessThanOrEqual(100);
    expect(result.riskLevel).toBe('low');
    expect(result.expectedReturn).toBeCloseTo((0.01 * 252) / 29, 6);
    expect(diagnostics.every((d) => d.reason !== 'INSUFFICIENT_HISTORY')).toBe(true);
  });

  it('같은 입력이면 같은 결과를 내야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });
    const bars = createBars(alternatingCloses(60).map((c, i) => c + i * 0.2));

    expect(analyzer.analyze(bars)).toEqual(analyzer.analyze(bars));
  });

  it('지정한 전략 식별자를 결과에 기록해야 함', () => {
    const analyzer = new TechnicalAnalyzer({ strategy: 'momentum', logger: createTestLogger() });
    const bars = createBars(alternatingCloses(30), 'sz.000001');

    const result = analyzer.analyze(bars);

    expect(result.strategy).toBe('momentum');
    expect(result.code).toBe('sz.000001');
    expect(result.analysisDate).toBe('2024-01-30');
  });
});

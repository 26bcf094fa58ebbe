import { describe, it, expect, vi } from 'vitest';
import { TechnicalAnalyzer } from '../../analysis/analyzer.js';
import { analyzeBatch } from '../../analysis/batch.js';
import type { Bar } from '../../types.js';
import { alternatingCloses, createBars, createTestLogger } from '../helpers.js';

function createUniverse(): Record<string, Bar[]> {
  return {
    'sh.600000': createBars(alternatingCloses(30), 'sh.600000'),
    'sz.000001': createBars(alternatingCloses(10), 'sz.000001'),
    'sz.000002': createBars(alternatingCloses(30), 'sz.000002'),
  };
}

describe('analyzeBatch', () => {
  it('이력 부족 종목은 skipped로 집계하고 계속 진행해야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });
    const logger = createTestLogger();

    const { results, summary } = analyzeBatch(analyzer, createUniverse(), { logger });

    expect(results.map((r) => r.code)).toEqual(['sh.600000', 'sz.000002']);
    expect(summary).toMatchObject({ total: 3, succeeded: 2, skipped: 1, failed: 0, cancelled: false });
    expect(summary.failures).toEqual([
      {
        code: 'sz.000001',
        kind: 'skipped',
        reason: '분석에 최소 26개의 Bar가 필요합니다 (sz.000001). 현재: 10개',
      },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('그 외 예외는 failed로 집계해야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });
    const original = analyzer.analyze.bind(analyzer);
    vi.spyOn(analyzer, 'analyze').mockImplementation((bars) => {
      if (bars[0]?.code === 'sz.000002') throw new Error('계산 실패');
      return original(bars);
    });

    const { results, summary } = analyzeBatch(analyzer, createUniverse(), {
      logger: createTestLogger(),
    });

    expect(results).toHaveLength(1);
    expect(summary.succeeded).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.failures[1]).toEqual({ code: 'sz.000002', kind: 'failed', reason: '계산 실패' });
  });

  it('중단 신호가 오면 종목 사이에서 멈추고 완료된 결과는 유지해야 함', () => {
    const controller = new AbortController();
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });
    const original = analyzer.analyze.bind(analyzer);
    vi.spyOn(analyzer, 'analyze').mockImplementation((bars) => {
      const result = original(bars);
      controller.abort();
      return result;
    });

    const { results, summary } = analyzeBatch(analyzer, createUniverse(), {
      signal: controller.signal,
      logger: createTestLogger(),
    });

    expect(results.map((r) => r.code)).toEqual(['sh.600000']);
    expect(summary.cancelled).toBe(true);
    expect(summary.succeeded).toBe(1);
    expect(summary.skipped + summary.failed).toBe(0);
  });

  it('빈 입력이면 빈 요약을 반환해야 함', () => {
    const analyzer = new TechnicalAnalyzer({ logger: createTestLogger() });

    const { results, summary } = analyzeBatch(analyzer, {}, { logger: createTestLogger() });

    expect(results).toEqual([]);
    expect(summary).toEqual({ total: 0, succeeded: 0, skipped: 0, failed: 0, cancelled: false, failures: [] });
  });
});

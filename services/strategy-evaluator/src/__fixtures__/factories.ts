import { vi } from 'vitest';
import type { AnalysisResult, Bar, Rating } from '@signal-lab/analysis-core';
import type { LogSink } from '@signal-lab/shared-utils';

export function createBar(code: string, date: string, close: number): Bar {
  return {
    date,
    code,
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    preclose: close,
    volume: 1000,
    amount: close * 1000,
    turnover: 0,
    adjustFlag: '3',
    tradeStatus: 1,
    pctChg: 0,
  };
}

/**
 * 2024-01-01부터 하루 간격 Bar 배열
 */
export function createDailyBars(code: string, closes: readonly number[]): Bar[] {
  const start = Date.UTC(2024, 0, 1);
  return closes.map((close, i) =>
    createBar(code, new Date(start + i * 86_400_000).toISOString().slice(0, 10), close)
  );
}

export function createResult(
  code: string,
  analysisDate: string,
  rating: Rating = 'hold',
  strategy = 'technical_composite'
): AnalysisResult {
  return {
    code,
    analysisDate,
    strategy,
    signals: { macd: 'hold', rsi: 'hold', kdj: 'hold', bollinger: 'hold', ma: 'hold' },
    score: rating === 'buy' ? 75 : rating === 'sell' ? 25 : 50,
    rating,
    riskLevel: 'medium',
    expectedReturn: 0,
  };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

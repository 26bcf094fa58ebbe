import { vi } from 'vitest';
import type { LogSink } from '@signal-lab/shared-utils';
import type { Bar } from '../types.js';

export function createBar(date: string, close: number, overrides: Partial<Bar> = {}): Bar {
  return {
    date,
    code: 'sh.600000',
    open: close,
    high: close,
    low: close,
    close,
    preclose: close,
    volume: 1000,
    amount: close * 1000,
    turnover: 0.5,
    adjustFlag: '3',
    tradeStatus: 1,
    pctChg: 0,
    ...overrides,
  };
}

/**
 * 2024-01-01부터 하루씩 증가하는 날짜로 Bar 배열 생성
 */
export function createBars(closes: readonly number[], code = 'sh.600000'): Bar[] {
  const start = Date.UTC(2024, 0, 1);
  return closes.map((close, i) => {
    const date = new Date(start + i * 86_400_000).toISOString().slice(0, 10);
    return createBar(date, close, { code, high: close * 1.01, low: close * 0.99 });
  });
}

/**
 * 100에서 시작해 +1% / -1%를 번갈아 반복하는 종가
 */
export function alternatingCloses(count: number): number[] {
  const closes = [100];
  for (let i = 1; i < count; i++) {
    closes.push(closes[i - 1] * (i % 2 === 1 ? 1.01 : 0.99));
  }
  return closes;
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

import type { AnalysisResult, Bar, PerformanceRecord, Rating } from '@signal-lab/analysis-core';

// ============================================================
// 평가 입력
// ============================================================

/**
 * 평가 구간 (YYYY-MM-DD, 양 끝 포함)
 */
export interface EvaluationWindow {
  start: string;
  end: string;
}

export interface EvaluationInput {
  strategy: string;
  window: EvaluationWindow;
  results: readonly AnalysisResult[];
  barsByCode: Readonly<Record<string, readonly Bar[]>>;
}

// ============================================================
// 조인 / 종목별 지표
// ============================================================

/**
 * 분석 결과와 같은 날짜의 Bar를 이은 포인트
 */
export interface JoinedPoint {
  date: string;
  rating: Rating;
  close: number;
}

export type SkipReason = 'EMPTY_JOIN' | 'INSUFFICIENT_JOIN';

export interface SkippedInstrument {
  code: string;
  reason: SkipReason;
  joinedPoints: number;
}

export interface InstrumentMetrics {
  code: string;
  joinedPoints: number;
  totalReturn: number;
  maxDrawdown: number;
  dailyReturns: number[];
  holdingReturns: number[];
}

// ============================================================
// 평가 결과
// ============================================================

export interface EvaluationOutcome {
  record: PerformanceRecord;
  instrumentsEvaluated: number;
  instruments: InstrumentMetrics[];
  skipped: SkippedInstrument[];
}

export interface TradeStats {
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  profitLossRatio: number;
}

// ============================================================
// 전략 비교
// ============================================================

export type ComparisonMetric = 'annualReturn' | 'sharpeRatio' | 'maxDrawdown' | 'winRate';

export interface BestPerformer {
  strategy: string;
  value: number;
}

export interface StrategyComparison {
  /** 연율화 수익률 내림차순 (동률은 입력 순서 유지) */
  ranking: PerformanceRecord[];
  best: Record<ComparisonMetric, BestPerformer | null>;
}

import type Big from 'big.js';

// =============================================================================
// Bar (일봉)
// =============================================================================

/**
 * 재무 지표 (선택)
 */
export interface BarFundamentals {
  peTTM?: number;
  pbMRQ?: number;
  psTTM?: number;
  pcfNcfTTM?: number;
  isST?: boolean;
}

/**
 * 종목의 거래일 1건 OHLCV 레코드
 *
 * 호출자는 날짜 오름차순, 중복 없는 시퀀스를 전달해야 한다.
 * 코어는 재정렬/중복 제거를 하지 않는다.
 */
export interface Bar {
  date: string; // YYYY-MM-DD
  code: string;
  open: number;
  high: number;
  low: number;
  close: number;
  preclose: number;
  volume: number;
  amount: number;
  turnover: number;
  adjustFlag: string;
  tradeStatus: number; // 1: 정상 거래, 0: 거래 정지
  pctChg: number;
  fundamentals?: BarFundamentals;
}

// =============================================================================
// Indicators
// =============================================================================

/**
 * 지표 값. 윈도우가 채워지기 전에는 null
 */
export type IndicatorValue = Big | null;

export interface MACDPoint {
  dif: IndicatorValue;
  dea: IndicatorValue;
  histogram: IndicatorValue;
}

export interface KDJPoint {
  k: IndicatorValue;
  d: IndicatorValue;
  j: IndicatorValue;
}

export interface BollingerPoint {
  upper: IndicatorValue;
  middle: IndicatorValue;
  lower: IndicatorValue;
}

/**
 * 입력 Bar와 1:1로 정렬된 지표 묶음
 */
export interface IndicatorPoint {
  date: string;
  close: Big;
  ma: Record<number, IndicatorValue>;
  macd: MACDPoint;
  rsi: Record<number, IndicatorValue>;
  kdj: KDJPoint;
  bollinger: BollingerPoint;
  volumeMa: Record<number, IndicatorValue>;
}

// =============================================================================
// Signals
// =============================================================================

export type Signal = 'buy' | 'sell' | 'hold';

export const SIGNAL_FAMILIES = ['macd', 'rsi', 'kdj', 'bollinger', 'ma'] as const;

export type SignalFamily = (typeof SIGNAL_FAMILIES)[number];

export type SignalSet = Record<SignalFamily, Signal>;

export type SignalDiagnosticReason = 'INSUFFICIENT_HISTORY' | 'UNDEFINED_INDICATOR';

/**
 * hold로 강등된 사유 (오류가 아닌 진단 정보)
 */
export interface SignalDiagnostic {
  family: SignalFamily;
  reason: SignalDiagnosticReason;
  detail: string;
}

export interface SignalEvaluation {
  signals: SignalSet;
  diagnostics: SignalDiagnostic[];
}

// =============================================================================
// Analysis Result
// =============================================================================

export type Rating = 'buy' | 'hold' | 'sell';

export type RiskLevel = 'low' | 'medium' | 'high';

/**
 * (종목, 분석일, 전략)당 1건 생성되는 분석 결과
 */
export interface AnalysisResult {
  readonly code: string;
  readonly analysisDate: string;
  readonly strategy: string;
  readonly signals: Readonly<SignalSet>;
  readonly score: number; // 0-100 정수
  readonly rating: Rating;
  readonly riskLevel: RiskLevel;
  readonly expectedReturn: number; // 연율화 기대 수익률
}

// =============================================================================
// Performance Record
// =============================================================================

/**
 * (전략, 평가 구간)당 1건의 성과 레코드
 */
export interface PerformanceRecord {
  readonly strategy: string;
  readonly windowStart: string;
  readonly windowEnd: string;
  readonly totalReturn: number;
  readonly annualReturn: number;
  readonly maxDrawdown: number;
  readonly sharpeRatio: number;
  readonly winRate: number;
  readonly profitLossRatio: number;
  readonly tradeCount: number;
}

// =============================================================================
// Batch
// =============================================================================

export type UnitFailureKind = 'skipped' | 'failed';

export interface UnitFailure {
  code: string;
  kind: UnitFailureKind;
  reason: string;
}

/**
 * 배치 처리 요약 (종목 단위 실패는 집계 후 계속 진행)
 */
export interface BatchSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
  failures: UnitFailure[];
}

import { InvalidConfigError } from '../errors.js';
import type { AnalysisResult, Bar } from '../types.js';
import type { TechnicalAnalyzer } from './analyzer.js';

export interface ReplayOptions {
  /** 각 분석일에 사용할 최근 Bar 수 (기본값: 300) */
  lookback?: number;
  /** 분석일 하한 (YYYY-MM-DD, 포함) */
  from?: string;
  /** 분석일 상한 (YYYY-MM-DD, 포함) */
  to?: string;
  signal?: AbortSignal;
}

/**
 * 과거 이력 재생 분석
 *
 * 최소 이력을 채운 시점부터 매 거래일마다, 그 날짜로 끝나는 최근 lookback개
 * Bar 윈도우로 분석한다. 각 결과는 해당 시점 이전 데이터만 사용한다.
 *
 * @param analyzer - 분석 파이프라인
 * @param bars - 한 종목의 Bar 배열 (오름차순)
 * @returns 분석일 순서의 AnalysisResult 배열
 */
export function replayAnalysis(
  analyzer: TechnicalAnalyzer,
  bars: readonly Bar[],
  options: ReplayOptions = {}
): AnalysisResult[] {
  const lookback = options.lookback ?? 300;

  if (!Number.isInteger(lookback) || lookback < analyzer.minHistory) {
    throw new InvalidConfigError('replayAnalysis', [
      `lookback: 최소 ${analyzer.minHistory} 이상의 정수여야 합니다. 현재: ${lookback}`,
    ]);
  }

  const results: AnalysisResult[] = [];

  for (let i = analyzer.minHistory - 1; i < bars.length; i++) {
    if (options.signal?.aborted) break;

    const date = bars[i].date;
    if (options.from && date < options.from) continue;
    if (options.to && date > options.to) break;

    const window = bars.slice(Math.max(0, i - lookback + 1), i + 1);
    results.push(analyzer.analyze(window));
  }

  return results;
}

import type { AnalysisResult, Bar } from '@signal-lab/analysis-core';
import type { EvaluationWindow, JoinedPoint } from '../types.js';

/**
 * 종목별로 분석 결과 묶기 (종목 첫 등장 순서 유지, 종목 내 분석일 오름차순)
 */
export function groupResultsByCode(
  results: readonly AnalysisResult[]
): Map<string, AnalysisResult[]> {
  const groups = new Map<string, AnalysisResult[]>();

  for (const result of results) {
    const group = groups.get(result.code);
    if (group) {
      group.push(result);
    } else {
      groups.set(result.code, [result]);
    }
  }

  for (const group of groups.values()) {
    group.sort((a, b) => (a.analysisDate < b.analysisDate ? -1 : a.analysisDate > b.analysisDate ? 1 : 0));
  }

  return groups;
}

/**
 * 분석일 = 거래일 내부 조인
 *
 * Bar가 없는 분석일은 버린다.
 */
export function joinResultsWithBars(
  results: readonly AnalysisResult[],
  bars: readonly Bar[]
): JoinedPoint[] {
  const closeByDate = new Map(bars.map((bar) => [bar.date, bar.close]));
  const joined: JoinedPoint[] = [];

  for (const result of results) {
    const close = closeByDate.get(result.analysisDate);
    if (close === undefined) continue;

    joined.push({ date: result.analysisDate, rating: result.rating, close });
  }

  return joined;
}

export function barsBetween(bars: readonly Bar[], start: string, end: string): Bar[] {
  return bars.filter((bar) => bar.date >= start && bar.date <= end);
}

export function isWithinWindow(date: string, window: EvaluationWindow): boolean {
  return date >= window.start && date <= window.end;
}

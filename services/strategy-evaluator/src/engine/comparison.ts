import type { PerformanceRecord } from '@signal-lab/analysis-core';
import type { BestPerformer, ComparisonMetric, StrategyComparison } from '../types.js';

/**
 * 지표별 비교 방향 (낙폭은 작을수록 우수)
 */
const METRIC_DIRECTION: Record<ComparisonMetric, 'max' | 'min'> = {
  annualReturn: 'max',
  sharpeRatio: 'max',
  maxDrawdown: 'min',
  winRate: 'max',
};

/**
 * 전략 성과 비교
 *
 * 연율화 수익률 내림차순으로 정렬하고, 지표별 최우수 전략을 따로 뽑는다.
 * 동률이면 순위표에서 앞선 전략을 택한다.
 */
export function compareStrategies(records: readonly PerformanceRecord[]): StrategyComparison {
  const ranking = [...records].sort((a, b) => b.annualReturn - a.annualReturn);

  return {
    ranking,
    best: {
      annualReturn: findBest(ranking, 'annualReturn'),
      sharpeRatio: findBest(ranking, 'sharpeRatio'),
      maxDrawdown: findBest(ranking, 'maxDrawdown'),
      winRate: findBest(ranking, 'winRate'),
    },
  };
}

function findBest(
  ranking: readonly PerformanceRecord[],
  metric: ComparisonMetric
): BestPerformer | null {
  const direction = METRIC_DIRECTION[metric];
  let best: BestPerformer | null = null;

  for (const record of ranking) {
    const value = record[metric];
    const better = best === null || (direction === 'max' ? value > best.value : value < best.value);
    if (better) {
      best = { strategy: record.strategy, value };
    }
  }

  return best;
}

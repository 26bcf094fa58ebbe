import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import { isInsufficientHistoryError } from '../errors.js';
import type { AnalysisResult, Bar, BatchSummary } from '../types.js';
import type { TechnicalAnalyzer } from './analyzer.js';

export interface AnalyzeBatchOptions {
  signal?: AbortSignal;
  logger?: LogSink;
}

export interface AnalysisBatchResult {
  results: AnalysisResult[];
  summary: BatchSummary;
}

export function createBatchSummary(total: number): BatchSummary {
  return { total, succeeded: 0, skipped: 0, failed: 0, cancelled: false, failures: [] };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 여러 종목 일괄 분석
 *
 * - 이력 부족 종목은 skipped, 그 외 예외는 failed로 집계하고 계속 진행
 * - AbortSignal이 켜지면 종목 사이에서 중단하며, 이미 만든 결과는 유효
 *
 * @param analyzer - 분석 파이프라인
 * @param barsByCode - 종목 코드별 Bar 배열
 */
export function analyzeBatch(
  analyzer: TechnicalAnalyzer,
  barsByCode: Readonly<Record<string, readonly Bar[]>>,
  options: AnalyzeBatchOptions = {}
): AnalysisBatchResult {
  const logger = options.logger ?? createLogger('analysis-batch');
  const codes = Object.keys(barsByCode);
  const summary = createBatchSummary(codes.length);
  const results: AnalysisResult[] = [];

  for (const code of codes) {
    if (options.signal?.aborted) {
      summary.cancelled = true;
      logger.warn('배치 분석 중단 요청', { processed: results.length + summary.skipped + summary.failed });
      break;
    }

    try {
      results.push(analyzer.analyze(barsByCode[code]));
      summary.succeeded++;
    } catch (error) {
      if (isInsufficientHistoryError(error)) {
        summary.skipped++;
        summary.failures.push({ code, kind: 'skipped', reason: error.message });
        logger.warn('이력 부족으로 분석 건너뜀', { code, required: error.required, actual: error.actual });
        continue;
      }

      summary.failed++;
      summary.failures.push({ code, kind: 'failed', reason: describeError(error) });
      logger.error(`종목 ${code} 분석 실패`, error);
    }
  }

  logger.info('배치 분석 완료', {
    total: summary.total,
    succeeded: summary.succeeded,
    skipped: summary.skipped,
    failed: summary.failed,
    cancelled: summary.cancelled,
  });

  return { results, summary };
}

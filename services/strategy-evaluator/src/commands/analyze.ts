import { TechnicalAnalyzer, type AnalysisResult, type BatchSummary } from '@signal-lab/analysis-core';
import { todayIsoDate } from '@signal-lab/shared-utils';
import { JsonFileBarSource } from '../data/loader.js';
import { runAnalysisBatch } from '../engine/batch.js';
import type { CommandContext } from './context.js';
import type { AnalyzeOptions, ReplayOptions } from './options.js';
import { writeJsonOutput } from './output.js';

export interface AnalysisCommandOutput {
  results: AnalysisResult[];
  summary: BatchSummary;
}

/**
 * 종목별 최신 분석 (기준일 이전 마지막 Bar 기준)
 */
export async function runAnalyze(
  options: AnalyzeOptions,
  context: CommandContext
): Promise<AnalysisCommandOutput> {
  const date = options.date ?? todayIsoDate();
  return runAnalysisCommand(options, { start: date, end: date }, 'latest', context);
}

/**
 * 구간 재생 분석 (구간 내 매 거래일)
 */
export async function runReplay(
  options: ReplayOptions,
  context: CommandContext
): Promise<AnalysisCommandOutput> {
  return runAnalysisCommand(options, { start: options.start, end: options.end }, 'replay', context);
}

async function runAnalysisCommand(
  options: Omit<AnalyzeOptions, 'date'>,
  window: { start: string; end: string },
  mode: 'latest' | 'replay',
  context: CommandContext
): Promise<AnalysisCommandOutput> {
  const { env, logger, signal } = context;
  const source = new JsonFileBarSource(options.bars, { logger });

  if (!(await source.healthCheck())) {
    throw new Error(`Bar 파일을 읽을 수 없습니다: ${options.bars}`);
  }

  const analyzer = new TechnicalAnalyzer({
    strategy: options.strategy ?? env.defaultStrategy,
    logger,
  });
  const codes = options.codes ?? (await source.codes());

  logger.info('분석 시작', { mode, codes: codes.length, ...window, strategy: analyzer.strategy });

  const { results, summary } = await runAnalysisBatch(source, {
    analyzer,
    codes,
    window,
    mode,
    lookback: options.lookback ?? env.lookbackBars,
    signal,
    logger,
  });

  const output = { results, summary };
  await writeJsonOutput(output, options.out);
  return output;
}

#!/usr/bin/env tsx
import { Command } from 'commander';
import { createLogger } from '@signal-lab/shared-utils';
import { loadEvaluatorEnv } from './config/env.js';
import { runAnalyze, runReplay } from './commands/analyze.js';
import { runCompare, runEvaluate } from './commands/evaluate.js';
import type { CommandContext } from './commands/context.js';
import {
  AnalyzeOptionsSchema,
  CompareOptionsSchema,
  EvaluateOptionsSchema,
  ReplayOptionsSchema,
} from './commands/options.js';

const env = loadEvaluatorEnv();
const logger = createLogger('signal-lab-cli', { level: env.logLevel });
const controller = new AbortController();

// Ctrl+C: 진행 중인 종목/전략까지만 처리하고 중단
process.once('SIGINT', () => {
  logger.warn('중단 요청 수신 (SIGINT)');
  controller.abort();
});

const context: CommandContext = { env, logger, signal: controller.signal };
const program = new Command();

program
  .name('signal-lab')
  .description('기술적 지표 시그널 분석 및 전략 성과 평가 CLI')
  .version('0.1.0');

/**
 * 최신 분석 명령
 */
program
  .command('analyze')
  .description('종목별 최신 AnalysisResult 생성')
  .requiredOption('--bars <file>', 'Bar JSON 파일 경로')
  .option('--codes <codes>', '종목 코드 목록 (쉼표 구분, 기본: 파일 내 전체)')
  .option('--date <date>', '기준일 (YYYY-MM-DD, 기본: 오늘)')
  .option('--strategy <name>', `전략 식별자 (기본: ${env.defaultStrategy})`)
  .option('--lookback <bars>', `분석에 사용할 최근 Bar 수 (기본: ${env.lookbackBars})`)
  .option('--out <file>', '결과 JSON 저장 경로 (기본: stdout)')
  .action(async (raw: unknown) => {
    try {
      await runAnalyze(AnalyzeOptionsSchema.parse(raw), context);
    } catch (error) {
      fail('분석 실패', error);
    }
  });

/**
 * 재생 분석 명령
 */
program
  .command('replay')
  .description('구간 내 매 거래일 AnalysisResult 생성 (과거 데이터만 사용)')
  .requiredOption('--bars <file>', 'Bar JSON 파일 경로')
  .requiredOption('--start <date>', '시작일 (YYYY-MM-DD)')
  .requiredOption('--end <date>', '종료일 (YYYY-MM-DD)')
  .option('--codes <codes>', '종목 코드 목록 (쉼표 구분, 기본: 파일 내 전체)')
  .option('--strategy <name>', `전략 식별자 (기본: ${env.defaultStrategy})`)
  .option('--lookback <bars>', `분석일별 윈도우 Bar 수 (기본: ${env.lookbackBars})`)
  .option('--out <file>', '결과 JSON 저장 경로 (기본: stdout)')
  .action(async (raw: unknown) => {
    try {
      await runReplay(ReplayOptionsSchema.parse(raw), context);
    } catch (error) {
      fail('재생 분석 실패', error);
    }
  });

/**
 * 성과 평가 명령
 */
program
  .command('evaluate')
  .description('단일 전략 PerformanceRecord 계산')
  .requiredOption('--bars <file>', 'Bar JSON 파일 경로')
  .requiredOption('--results <file>', 'AnalysisResult JSON 파일 경로')
  .requiredOption('--start <date>', '평가 시작일 (YYYY-MM-DD)')
  .requiredOption('--end <date>', '평가 종료일 (YYYY-MM-DD)')
  .option('--strategy <name>', `전략 식별자 (기본: ${env.defaultStrategy})`)
  .option('--risk-free-rate <rate>', `연간 무위험 수익률 (기본: ${env.riskFreeRate})`)
  .option('--out <file>', '결과 JSON 저장 경로 (기본: stdout)')
  .action(async (raw: unknown) => {
    try {
      await runEvaluate(EvaluateOptionsSchema.parse(raw), context);
    } catch (error) {
      fail('성과 평가 실패', error);
    }
  });

/**
 * 전략 비교 명령
 */
program
  .command('compare')
  .description('여러 전략 성과 비교 (연율화 수익률 순위 + 지표별 최우수)')
  .requiredOption('--bars <file>', 'Bar JSON 파일 경로')
  .requiredOption('--results <file>', 'AnalysisResult JSON 파일 경로')
  .requiredOption('--start <date>', '평가 시작일 (YYYY-MM-DD)')
  .requiredOption('--end <date>', '평가 종료일 (YYYY-MM-DD)')
  .option('--strategies <names>', '전략 목록 (쉼표 구분, 기본: 결과 파일 내 전체)')
  .option('--risk-free-rate <rate>', `연간 무위험 수익률 (기본: ${env.riskFreeRate})`)
  .option('--out <file>', '결과 JSON 저장 경로 (기본: stdout)')
  .action(async (raw: unknown) => {
    try {
      await runCompare(CompareOptionsSchema.parse(raw), context);
    } catch (error) {
      fail('전략 비교 실패', error);
    }
  });

function fail(message: string, error: unknown): never {
  logger.error(message, error);
  console.error(`❌ ${message}: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

// CLI 실행
program.parseAsync().catch((error: unknown) => fail('CLI 실행 실패', error));

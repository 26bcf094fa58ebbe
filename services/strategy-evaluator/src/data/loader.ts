import { access, readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { AnalysisResult, Bar, BarSource } from '@signal-lab/analysis-core';
import { createLogger, type LogSink } from '@signal-lab/shared-utils';
import { TradingDateSchema } from '../config/schema.js';
import { BarValidationError, DataFileError } from '../errors.js';

// ============================================================
// 스키마
// ============================================================

// 빈 문자열 / null은 결측값 (0으로 변환하지 않음)
function blankToUndefined(value: unknown): unknown {
  return value === '' || value === null ? undefined : value;
}

const NumericSchema = z.preprocess(blankToUndefined, z.coerce.number().finite());

function optionalNumeric(defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().finite().default(defaultValue));
}

const OptionalNumericSchema = z.preprocess(
  blankToUndefined,
  z.coerce.number().finite().optional()
);

const FlagSchema = z.union([
  z.boolean(),
  z.enum(['0', '1']).transform((flag) => flag === '1'),
]);

const FundamentalsSchema = z
  .object({
    peTTM: OptionalNumericSchema,
    pbMRQ: OptionalNumericSchema,
    psTTM: OptionalNumericSchema,
    pcfNcfTTM: OptionalNumericSchema,
    isST: z.preprocess(blankToUndefined, FlagSchema.optional()),
  })
  .optional();

/**
 * 저장된 일봉 레코드 (숫자 문자열 허용)
 */
export const BarRecordSchema = z.object({
  date: TradingDateSchema,
  code: z.string().min(1),
  open: NumericSchema,
  high: NumericSchema,
  low: NumericSchema,
  close: NumericSchema,
  preclose: optionalNumeric(0),
  volume: NumericSchema,
  amount: optionalNumeric(0),
  turnover: optionalNumeric(0),
  adjustFlag: z.preprocess(blankToUndefined, z.coerce.string().default('3')),
  tradeStatus: z.preprocess(blankToUndefined, z.coerce.number().int().default(1)),
  pctChg: optionalNumeric(0),
  fundamentals: FundamentalsSchema,
});

/**
 * 배열 그대로 또는 { [field]: 배열 } 형태 모두 허용
 */
function unwrapField(field: string) {
  return (raw: unknown): unknown => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      return raw;
    }
    const value: unknown = Reflect.get(raw, field);
    return value === undefined ? raw : value;
  };
}

const BarFileSchema = z.preprocess(unwrapField('bars'), z.array(BarRecordSchema));

const SignalSchema = z.enum(['buy', 'sell', 'hold']);

const SignalSetSchema = z.object({
  macd: SignalSchema,
  rsi: SignalSchema,
  kdj: SignalSchema,
  bollinger: SignalSchema,
  ma: SignalSchema,
});

export const AnalysisResultSchema = z.object({
  code: z.string().min(1),
  analysisDate: TradingDateSchema,
  strategy: z.string().min(1),
  signals: SignalSetSchema,
  score: z.number().int().min(0).max(100),
  rating: z.enum(['buy', 'hold', 'sell']),
  riskLevel: z.enum(['low', 'medium', 'high']),
  expectedReturn: z.number().finite(),
});

const AnalysisResultFileSchema = z.preprocess(
  unwrapField('results'),
  z.array(AnalysisResultSchema)
);

// ============================================================
// 파싱 / 검증
// ============================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * JSON 값 → Bar 배열 (스키마 검증만, 정렬/중복 검증은 validateBarSequence)
 */
export function parseBars(raw: unknown, source = '(inline)'): Bar[] {
  const parsed = BarFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFileError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseAnalysisResults(raw: unknown, source = '(inline)'): AnalysisResult[] {
  const parsed = AnalysisResultFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFileError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * 한 종목 Bar 시퀀스 전제 조건 검증
 *
 * - 날짜 오름차순, 중복 없음
 * - low <= min(open, close), high >= max(open, close)
 * - 가격 / 거래량 음수 없음
 *
 * @throws BarValidationError - 위반 항목 전체를 담아 던진다
 */
export function validateBarSequence(bars: readonly Bar[]): void {
  const issues: string[] = [];

  bars.forEach((bar, i) => {
    const previous = bars[i - 1];
    if (previous) {
      if (bar.date === previous.date) {
        issues.push(`${bar.date}: 중복 날짜`);
      } else if (bar.date < previous.date) {
        issues.push(`${bar.date}: 날짜 역순 (직전 ${previous.date})`);
      }
    }

    if ([bar.open, bar.high, bar.low, bar.close].some((price) => price < 0)) {
      issues.push(`${bar.date}: 음수 가격`);
    }
    if (bar.low > Math.min(bar.open, bar.close) || bar.high < Math.max(bar.open, bar.close)) {
      issues.push(`${bar.date}: OHLC 불일치 (O=${bar.open} H=${bar.high} L=${bar.low} C=${bar.close})`);
    }
    if (bar.volume < 0) {
      issues.push(`${bar.date}: 음수 거래량`);
    }
  });

  if (issues.length > 0) {
    throw new BarValidationError(bars[0]?.code ?? '(unknown)', issues);
  }
}

/**
 * 종목별로 Bar 묶기 (입력 순서 유지)
 */
export function groupBarsByCode(bars: readonly Bar[]): Record<string, Bar[]> {
  const grouped = new Map<string, Bar[]>();
  for (const bar of bars) {
    const group = grouped.get(bar.code);
    if (group) {
      group.push(bar);
    } else {
      grouped.set(bar.code, [bar]);
    }
  }
  return Object.fromEntries(grouped);
}

// ============================================================
// 파일 입출력
// ============================================================

async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DataFileError(filePath, [error instanceof Error ? error.message : String(error)]);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new DataFileError(filePath, [
      `JSON 파싱 실패: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
}

/**
 * 저장된 AnalysisResult 파일 로드
 */
export async function loadAnalysisResults(filePath: string): Promise<AnalysisResult[]> {
  return parseAnalysisResults(await readJsonFile(filePath), filePath);
}

/**
 * 종목별로 검증된 Bar 파일 로드
 */
export async function loadBarFile(filePath: string): Promise<Record<string, Bar[]>> {
  const grouped = groupBarsByCode(parseBars(await readJsonFile(filePath), filePath));
  for (const bars of Object.values(grouped)) {
    validateBarSequence(bars);
  }
  return grouped;
}

/**
 * JSON 파일 기반 BarSource
 *
 * 첫 조회 시 파일 전체를 읽고 검증한 뒤 메모리에 유지한다.
 */
export class JsonFileBarSource implements BarSource {
  readonly name = 'json-file';
  private cache: Promise<Record<string, Bar[]>> | null = null;
  private readonly logger: LogSink;

  constructor(
    private readonly filePath: string,
    options: { logger?: LogSink } = {}
  ) {
    this.logger = options.logger ?? createLogger('json-bar-source');
  }

  async fetchBars(code: string, startDate: string, endDate: string): Promise<Bar[]> {
    const barsByCode = await this.load();
    const bars = Object.hasOwn(barsByCode, code) ? barsByCode[code] : [];
    return bars.filter((bar) => bar.date >= startDate && bar.date <= endDate);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch (error) {
      this.logger.warn('Bar 파일 접근 불가', {
        filePath: this.filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async codes(): Promise<string[]> {
    return Object.keys(await this.load());
  }

  private async load(): Promise<Record<string, Bar[]>> {
    if (!this.cache) {
      this.cache = loadBarFile(this.filePath);
    }

    try {
      const grouped = await this.cache;
      return grouped;
    } catch (error) {
      // 실패한 로드는 캐시하지 않는다
      this.cache = null;
      throw error;
    }
  }
}

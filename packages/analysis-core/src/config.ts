import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

const PeriodSchema = z.number().int().positive();

// ============================================================
// IndicatorEngine
// ============================================================

export const IndicatorConfigSchema = z
  .object({
    maPeriods: z.array(PeriodSchema).default([5, 10, 20, 60, 120, 250]),
    macd: z
      .object({
        fast: PeriodSchema.default(12),
        slow: PeriodSchema.default(26),
        signal: PeriodSchema.default(9),
      })
      .default({}),
    rsiPeriods: z.array(PeriodSchema).default([6, 12, 24]),
    kdj: z
      .object({
        length: PeriodSchema.default(9),
        signal: PeriodSchema.default(3),
      })
      .default({}),
    bollinger: z
      .object({
        length: PeriodSchema.min(2).default(20),
        std: z.number().positive().default(2),
      })
      .default({}),
    volumeMaPeriods: z.array(PeriodSchema).default([5, 10, 20]),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.macd.fast >= cfg.macd.slow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['macd', 'fast'],
        message: `macd.fast(${cfg.macd.fast})는 macd.slow(${cfg.macd.slow})보다 작아야 합니다`,
      });
    }
  });

export type IndicatorConfigInput = z.input<typeof IndicatorConfigSchema>;
export type IndicatorConfig = z.output<typeof IndicatorConfigSchema>;

// ============================================================
// SignalEngine
// ============================================================

export const SignalConfigSchema = z
  .object({
    ma: z
      .object({
        short: PeriodSchema.default(5),
        long: PeriodSchema.default(20),
      })
      .default({}),
    rsiPeriod: PeriodSchema.default(14),
    rsiOversold: z.number().min(0).max(100).default(30),
    rsiOverbought: z.number().min(0).max(100).default(70),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.ma.short >= cfg.ma.long) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ma', 'short'],
        message: `ma.short(${cfg.ma.short})는 ma.long(${cfg.ma.long})보다 작아야 합니다`,
      });
    }
    if (cfg.rsiOversold >= cfg.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rsiOversold'],
        message: 'rsiOversold는 rsiOverbought보다 작아야 합니다',
      });
    }
  });

export type SignalConfigInput = z.input<typeof SignalConfigSchema>;
export type SignalConfig = z.output<typeof SignalConfigSchema>;

// ============================================================
// ScoringEngine
// ============================================================

const WeightSchema = z.number().nonnegative();

export const ScoringConfigSchema = z
  .object({
    weights: z
      .object({
        macd: WeightSchema.default(25),
        rsi: WeightSchema.default(20),
        kdj: WeightSchema.default(20),
        bollinger: WeightSchema.default(15),
        ma: WeightSchema.default(20),
      })
      .default({}),
    baseline: z.number().min(0).max(100).default(50),
    buyThreshold: z.number().min(0).max(100).default(70),
    sellThreshold: z.number().min(0).max(100).default(30),
    volatilityBands: z
      .object({
        low: z.number().positive().default(0.2),
        medium: z.number().positive().default(0.4),
      })
      .default({}),
    expectedReturnWindow: PeriodSchema.default(30),
    tradingDaysPerYear: PeriodSchema.default(252),
    minHistory: PeriodSchema.min(2).default(26),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.sellThreshold >= cfg.buyThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sellThreshold'],
        message: 'sellThreshold는 buyThreshold보다 작아야 합니다',
      });
    }
    if (cfg.volatilityBands.low >= cfg.volatilityBands.medium) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['volatilityBands', 'low'],
        message: 'volatilityBands.low는 volatilityBands.medium보다 작아야 합니다',
      });
    }
  });

export type ScoringConfigInput = z.input<typeof ScoringConfigSchema>;
export type ScoringConfig = z.output<typeof ScoringConfigSchema>;

// ============================================================
// 공통 파서
// ============================================================

/**
 * 스키마 검증 후 기본값이 채워진 설정 반환
 *
 * @throws InvalidConfigError - 검증 실패 시
 */
export function parseConfig<S extends z.ZodTypeAny>(
  component: string,
  schema: S,
  input: unknown
): z.output<S> {
  const parsed = schema.safeParse(input ?? {});

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new InvalidConfigError(component, issues);
  }

  return parsed.data;
}

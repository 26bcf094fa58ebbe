import { z } from 'zod';
import { isValidTradingDate } from '@signal-lab/shared-utils';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const TradingDateSchema = z
  .string()
  .regex(DATE_PATTERN, '날짜는 YYYY-MM-DD 형식이어야 합니다')
  .refine(isValidTradingDate, '존재하지 않는 날짜입니다');

export const EvaluationWindowSchema = z
  .object({
    start: TradingDateSchema,
    end: TradingDateSchema,
  })
  .refine((window) => window.start <= window.end, {
    message: '평가 시작일은 종료일보다 늦을 수 없습니다',
    path: ['start'],
  });

export const EvaluatorConfigSchema = z.object({
  riskFreeRate: z.number().min(0).max(1).default(0.03),
  tradingDaysPerYear: z.number().int().positive().default(252),
  daysPerYear: z.number().int().positive().default(365),
});

export type EvaluatorConfigInput = z.input<typeof EvaluatorConfigSchema>;
export type EvaluatorConfig = z.output<typeof EvaluatorConfigSchema>;

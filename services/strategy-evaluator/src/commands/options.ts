import { z } from 'zod';
import { TradingDateSchema } from '../config/schema.js';

const CodeListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((code) => code.trim())
      .filter(Boolean)
  )
  .optional();

const LookbackSchema = z.coerce.number().int().positive().optional();

export const AnalyzeOptionsSchema = z.object({
  bars: z.string().min(1),
  codes: CodeListSchema,
  date: TradingDateSchema.optional(),
  strategy: z.string().min(1).optional(),
  lookback: LookbackSchema,
  out: z.string().min(1).optional(),
});

export const ReplayOptionsSchema = AnalyzeOptionsSchema.omit({ date: true }).extend({
  start: TradingDateSchema,
  end: TradingDateSchema,
});

export const EvaluateOptionsSchema = z.object({
  bars: z.string().min(1),
  results: z.string().min(1),
  strategy: z.string().min(1).optional(),
  start: TradingDateSchema,
  end: TradingDateSchema,
  riskFreeRate: z.coerce.number().min(0).max(1).optional(),
  out: z.string().min(1).optional(),
});

export const CompareOptionsSchema = EvaluateOptionsSchema.omit({ strategy: true }).extend({
  strategies: CodeListSchema,
});

export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;
export type ReplayOptions = z.infer<typeof ReplayOptionsSchema>;
export type EvaluateOptions = z.infer<typeof EvaluateOptionsSchema>;
export type CompareOptions = z.infer<typeof CompareOptionsSchema>;

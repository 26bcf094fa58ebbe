import { env, envNumber, envPositiveInt, envString } from '@signal-lab/shared-utils/env';
import { parseLogLevel, type LogLevel } from '@signal-lab/shared-utils';
import { DEFAULT_STRATEGY } from '@signal-lab/analysis-core';

export interface EvaluatorEnv {
  logLevel: LogLevel;
  riskFreeRate: number;
  lookbackBars: number;
  defaultStrategy: string;
}

/**
 * CLI 실행 환경 설정 (.env 포함)
 */
export function loadEvaluatorEnv(): EvaluatorEnv {
  return {
    logLevel: parseLogLevel(env('LOG_LEVEL')),
    riskFreeRate: envNumber('RISK_FREE_RATE', 0.03),
    lookbackBars: envPositiveInt('ANALYSIS_LOOKBACK_BARS', 300),
    defaultStrategy: envString('DEFAULT_STRATEGY', DEFAULT_STRATEGY),
  };
}

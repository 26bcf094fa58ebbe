import type { LogSink } from '@signal-lab/shared-utils';
import type { EvaluatorEnv } from '../config/env.js';

/**
 * 명령 실행 공통 컨텍스트
 */
export interface CommandContext {
  env: EvaluatorEnv;
  logger: LogSink;
  signal?: AbortSignal;
}

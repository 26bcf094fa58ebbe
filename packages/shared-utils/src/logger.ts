import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export interface LoggerOptions {
  /** 이 레벨 미만의 로그는 버린다 (기본값: INFO) */
  level?: LogLevel;
}

/**
 * 엔진들이 의존하는 로그 출력 인터페이스
 *
 * 전역 로거 대신 각 컴포넌트 생성 시 명시적으로 주입한다.
 */
export interface LogSink {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

export class Logger implements LogSink {
  private readonly minLevel: LogLevel;

  constructor(
    private serviceName: string,
    options: LoggerOptions = {}
  ) {
    this.minLevel = options.level ?? 'INFO';
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string, options?: LoggerOptions): Logger {
  return new Logger(serviceName, options);
}

/**
 * 문자열을 로그 레벨로 변환 (알 수 없는 값이면 기본값)
 */
export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'INFO' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  return fallback;
}

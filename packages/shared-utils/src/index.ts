export { Logger, createLogger, parseLogLevel } from './logger.js';
export type { LogLevel, LogSink, LoggerOptions } from './logger.js';
export { nowIso, parseTradingDate, calendarDaysBetween, isValidTradingDate, todayIsoDate } from './date.js';

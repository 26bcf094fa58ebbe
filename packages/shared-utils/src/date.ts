import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/**
 * 거래일 문자열(YYYY-MM-DD) 파싱
 */
export function parseTradingDate(value: string): DateTime {
  const dt = DateTime.fromISO(value, { zone: 'utc' });
  if (!dt.isValid) throw new Error(`날짜 형식 오류: ${value}`);
  return dt;
}

export function isValidTradingDate(value: string): boolean {
  return DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

/**
 * 두 날짜 사이의 달력 일수 (end - start)
 */
export function calendarDaysBetween(start: string, end: string): number {
  return Math.round(parseTradingDate(end).diff(parseTradingDate(start), 'days').days);
}

export function todayIsoDate(): string {
  const today = DateTime.utc().toISODate();
  if (!today) throw new Error('오늘 날짜 변환 실패');
  return today;
}

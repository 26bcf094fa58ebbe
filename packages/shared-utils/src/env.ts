import 'dotenv/config';

/**
 * 환경 변수 조회 헬퍼
 *
 * dotenv 로딩 부작용이 있으므로 CLI 등 프로세스 진입점에서만 import 한다.
 */
export function env(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function envString(key: string, defaultValue: string): string {
  return env(key) ?? defaultValue;
}

export function envNumber(key: string, defaultValue: number): number {
  const value = env(key);
  if (value === undefined) return defaultValue;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new Error(`환경 변수 ${key}는 숫자여야 합니다. 현재: ${value}`);
  }
  return num;
}

export function envPositiveInt(key: string, defaultValue: number): number {
  const num = envNumber(key, defaultValue);
  if (!Number.isInteger(num) || num <= 0) {
    throw new Error(`환경 변수 ${key}는 양의 정수여야 합니다. 현재: ${num}`);
  }
  return num;
}

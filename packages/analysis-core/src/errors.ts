/**
 * 분석 코어 에러 클래스
 */

/**
 * 최소 이력 미달 (ScoringEngine 전제 조건 위반)
 *
 * 해당 종목/날짜 단위에만 영향을 주며, 배치는 이를 집계하고 계속 진행한다.
 */
export class InsufficientHistoryError extends Error {
  required: number;
  actual: number;
  code?: string;

  constructor(required: number, actual: number, code?: string) {
    const target = code ? ` (${code})` : '';
    super(`분석에 최소 ${required}개의 Bar가 필요합니다${target}. 현재: ${actual}개`);
    this.name = 'InsufficientHistoryError';
    this.required = required;
    this.actual = actual;
    this.code = code;
  }
}

/**
 * 컴포넌트 설정 검증 실패
 */
export class InvalidConfigError extends Error {
  issues: string[];

  constructor(component: string, issues: string[]) {
    super(`[${component}] 설정 오류: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

export function isInsufficientHistoryError(error: unknown): error is InsufficientHistoryError {
  return error instanceof InsufficientHistoryError;
}

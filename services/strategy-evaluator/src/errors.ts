/**
 * 입력 데이터 파일 오류 (읽기 / JSON 파싱 / 스키마 검증)
 */
export class DataFileError extends Error {
  filePath: string;
  issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`데이터 파일 오류 (${filePath}): ${issues.join('; ')}`);
    this.name = 'DataFileError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

/**
 * Bar 시퀀스 전제 조건 위반 (정렬 / 중복 / OHLC 정합성)
 */
export class BarValidationError extends Error {
  code: string;
  issues: string[];

  constructor(code: string, issues: string[]) {
    super(`[${code}] Bar 검증 실패: ${issues.join('; ')}`);
    this.name = 'BarValidationError';
    this.code = code;
    this.issues = issues;
  }
}

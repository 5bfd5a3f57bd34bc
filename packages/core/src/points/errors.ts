/**
 * 포인트 엔진 에러 타입
 *
 * 구조적 실패(파일, 컬럼, 기준점)와 행 단위 실패를 구분해서
 * 호출자가 에러 종류에 따라 다르게 처리할 수 있음
 */
export type PointEngineErrorType =
  | 'INVALID_LABEL' // RefMark / Spot 이외의 라벨
  | 'INVALID_POINT' // 좌표/직경/스케일 값이 규칙 위반
  | 'INVALID_SETTINGS' // 기본 설정 값이 규칙 위반
  | 'DUPLICATE_ID' // Registry에 이미 있는 ID
  | 'MALFORMED_ROW' // 필수 숫자 필드를 읽을 수 없음
  | 'MALFORMED_FILE' // 헤더 없음, 빈 파일
  | 'MISSING_COLUMNS' // 필수 헤더 누락
  | 'NOT_FOUND' // ID 조회 실패
  | 'DEGENERATE_REFERENCE_SET' // 기준점 3개가 일직선/중복
  | 'INSUFFICIENT_REFERENCE_POINTS' // 기준점 3개 미만
  | 'FILE_ACCESS'; // 파일 읽기/쓰기 실패

/**
 * 포인트 엔진 에러 클래스
 */
export class PointEngineError extends Error {
  readonly type: PointEngineErrorType;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    type: PointEngineErrorType,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'PointEngineError';
    this.type = type;
    this.details = details;

    // Error 클래스를 상속할 때 필요한 프로토타입 체인 수정
    Object.setPrototypeOf(this, PointEngineError.prototype);
  }

  /**
   * 허용되지 않는 라벨
   */
  static invalidLabel(label: unknown): PointEngineError {
    return new PointEngineError(
      `Invalid label: ${String(label)}. Use either 'RefMark' or 'Spot'`,
      'INVALID_LABEL',
      { label }
    );
  }

  /**
   * ID 조회 실패
   */
  static notFound(id: number): PointEngineError {
    return new PointEngineError(`Analysis point not found: ${id}`, 'NOT_FOUND', {
      id,
    });
  }

  /**
   * 파일 시스템 에러로부터 생성
   */
  static fromFileError(
    error: unknown,
    path: string,
    operation: 'read' | 'write'
  ): PointEngineError {
    if (error instanceof PointEngineError) {
      return error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    return new PointEngineError(
      `Unable to ${operation} file ${path}: ${reason}`,
      'FILE_ACCESS',
      { path, operation }
    );
  }
}

/**
 * PointEngineError 여부 (선택적으로 타입까지) 확인
 */
export function isPointEngineError(
  error: unknown,
  type?: PointEngineErrorType
): error is PointEngineError {
  if (!(error instanceof PointEngineError)) {
    return false;
  }
  return type === undefined || error.type === type;
}

/**
 * 에러 메시지 추출
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

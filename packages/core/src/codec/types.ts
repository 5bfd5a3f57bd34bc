/**
 * Row Codec Type Definitions
 *
 * 두 가지 CSV 방언:
 * 1. Native - 이 도구 고유 포맷 (모든 필드 왕복 보존)
 * 2. Instrument - 외부 장비 소프트웨어 포맷 (ID, X, Y, 분류 컬럼만 사용)
 */

// =============================================================================
// Dialects
// =============================================================================

/**
 * Native 방언
 */
export interface NativeDialect {
  kind: 'native';
}

/**
 * Instrument 방언 컬럼 설정
 */
export interface InstrumentColumns {
  /** 포인트 식별자 컬럼 */
  idColumn: string;
  /** X 좌표 컬럼 (원점: 우상단) */
  xColumn: string;
  /** Y 좌표 컬럼 */
  yColumn: string;
  /** 분류 컬럼 (기준점 여부 판단) */
  labelColumn: string;
  /** 기준점을 나타내는 분류 값 */
  referenceLabel: string;
}

/**
 * Instrument 방언
 *
 * imageWidth는 X축 반전에 사용 (x_native = imageWidth - x_instrument)
 */
export interface InstrumentDialect extends InstrumentColumns {
  kind: 'instrument';
  /** 대상 이미지 너비 (픽셀) */
  imageWidth: number;
}

export type Dialect = NativeDialect | InstrumentDialect;

/**
 * 장비 소프트웨어 기본 컬럼
 */
export const DEFAULT_INSTRUMENT_COLUMNS: Readonly<InstrumentColumns> = {
  idColumn: 'Particle ID',
  xColumn: 'Laser Ablation Centre X',
  yColumn: 'Laser Ablation Centre Y',
  labelColumn: 'Mineral Classification',
  referenceLabel: 'Fiducial',
};

export const NATIVE_DIALECT: NativeDialect = { kind: 'native' };

/**
 * Instrument 방언 생성
 */
export function instrumentDialect(
  imageWidth: number,
  columns: Partial<InstrumentColumns> = {}
): InstrumentDialect {
  return {
    kind: 'instrument',
    ...DEFAULT_INSTRUMENT_COLUMNS,
    ...columns,
    imageWidth,
  };
}

// =============================================================================
// Native Format
// =============================================================================

/**
 * Native 포맷 export 헤더 (순서 고정)
 *
 * Name = <sampleName>_#<id>
 */
export const NATIVE_HEADERS = [
  'Name',
  'label',
  'x',
  'y',
  'diameter',
  'scale',
  'colour',
  'mount_name',
  'material',
  'notes',
] as const;

export type NativeHeader = (typeof NATIVE_HEADERS)[number];

/**
 * Name 컬럼의 sampleName / id 구분자
 */
export const NAME_ID_SEPARATOR = '_#';

// =============================================================================
// Decoded Rows
// =============================================================================

/**
 * Instrument 방언에서 디코딩된 행
 */
export interface InstrumentRow {
  /** 데이터 행 번호 (1부터) */
  rowNumber: number;
  /** 식별자 (기준점 행은 없을 수 있음) */
  id: number | null;
  /** 기준점 행 여부 */
  isReference: boolean;
  /** X 좌표 (반전 후, 원점 좌상단) */
  x: number;
  /** Y 좌표 */
  y: number;
  /** 원본 레코드 (재출력용) */
  record: Record<string, string>;
}

// =============================================================================
// Import Result
// =============================================================================

/**
 * 가져오기 결과
 *
 * 행 단위 실패는 errors에 기록하고 skippedCount 증가
 */
export interface ImportResult<T> {
  /** 성공 여부 (구조적 에러 없음 + 한 행 이상 성공) */
  success: boolean;
  /** 디코딩된 행들 */
  rows: T[];
  /** 원본 헤더 (파일 순서) */
  headers: string[];
  /** 에러 목록 */
  errors: string[];
  /** 경고 목록 */
  warnings: string[];
  /** 스킵된 개수 */
  skippedCount: number;
}

/**
 * Instrument 방언 가져오기 결과
 *
 * 스킵된 행 중 기준점 행 개수를 따로 기록 (대상 행 실패와 구분)
 */
export interface InstrumentImportResult extends ImportResult<InstrumentRow> {
  /** 스킵된 기준점 행 개수 */
  skippedReferenceCount: number;
}

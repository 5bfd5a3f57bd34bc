/**
 * Analysis Point Type Definitions
 *
 * 분석 포인트(레이저 어블레이션 타겟) 데이터 모델
 */

// =============================================================================
// Basic Types
// =============================================================================

/**
 * 2D 좌표점
 */
export interface Coordinate {
  x: number;
  y: number;
}

/**
 * 이미지 크기 (픽셀)
 */
export interface ImageSize {
  width: number;
  height: number;
}

/**
 * 포인트 라벨
 *
 * - RefMark: 재좌표화에 사용되는 기준 마크
 * - Spot: 일반 분석 타겟
 */
export const POINT_LABELS = ['RefMark', 'Spot'] as const;

export type PointLabel = (typeof POINT_LABELS)[number];

/**
 * 라벨 타입 가드
 */
export function isPointLabel(value: unknown): value is PointLabel {
  return POINT_LABELS.some((label) => label === value);
}

// =============================================================================
// Analysis Point (Core Data Structure)
// =============================================================================

/**
 * 분석 포인트
 *
 * 순수 데이터 - 화면 표시용 요소는 renderers에서 파생
 * 좌표는 현재 로드된 이미지의 픽셀 좌표 (원점: 좌상단, 정수)
 */
export interface AnalysisPoint {
  /** 고유 식별자 (Registry 내에서 유일, 양의 정수) */
  readonly id: number;
  /** 라벨 */
  readonly label: PointLabel;
  /** X 좌표 (픽셀) */
  readonly x: number;
  /** Y 좌표 (픽셀) */
  readonly y: number;
  /** 직경 (µm 의도, 강제하지 않음) */
  readonly diameter: number;
  /** 배치 당시 스케일 (pixels / µm) */
  readonly scale: number;
  /** 표시 색상 */
  readonly colour: string;
  readonly sampleName: string;
  readonly mountName: string;
  readonly material: string;
  readonly notes: string;
}

/**
 * 포인트 추가 입력
 *
 * id가 없으면 Registry가 할당
 */
export interface PointInput {
  id?: number;
  label: string;
  x: number;
  y: number;
  diameter: number;
  scale: number;
  colour: string;
  sampleName: string;
  mountName: string;
  material: string;
  notes: string;
}

/**
 * 테이블 편집으로 수정 가능한 필드
 */
export interface PointMetadataPatch {
  label?: string;
  sampleName?: string;
  mountName?: string;
  material?: string;
  notes?: string;
}

// =============================================================================
// Point Settings
// =============================================================================

/**
 * 포인트 기본 설정
 *
 * 클릭 배치와 CSV import 양쪽에서 누락된 값을 채우는 데 사용
 */
export interface PointSettings {
  label: PointLabel;
  sampleName: string;
  mountName: string;
  material: string;
  notes: string;
  colour: string;
  diameter: number;
  scale: number;
}

/**
 * 메타데이터 누락 시 사용하는 값
 */
export const NONE_SENTINEL = 'None';

/**
 * 기본 설정
 */
export const DEFAULT_POINT_SETTINGS: Readonly<PointSettings> = {
  label: 'RefMark',
  sampleName: NONE_SENTINEL,
  mountName: NONE_SENTINEL,
  material: NONE_SENTINEL,
  notes: '',
  colour: '#ffff00',
  diameter: 10,
  scale: 1.0,
};

// =============================================================================
// Validation Types
// =============================================================================

/**
 * 유효성 검증 결과
 */
export interface ValidationResult {
  /** 유효 여부 */
  valid: boolean;
  /** 에러 메시지 목록 */
  errors: string[];
  /** 경고 메시지 목록 */
  warnings: string[];
}

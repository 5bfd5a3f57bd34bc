/**
 * Affine Transform Type Definitions
 *
 * 좌표계:
 * 1. Source - 변환 전 좌표계 (예: 장비 좌표, X축 반전 후)
 * 2. Destination - 변환 후 좌표계 (현재 로드된 이미지 픽셀 좌표)
 */

import type { Coordinate } from '../points/types';

// =============================================================================
// Transform
// =============================================================================

/**
 * 2D 아핀 변환 T(p) = A·p + b
 *
 * x' = a·x + b·y + tx
 * y' = c·x + d·y + ty
 */
export interface AffineTransform {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly tx: number;
  readonly ty: number;
}

export const IDENTITY_TRANSFORM: AffineTransform = {
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  tx: 0,
  ty: 0,
};

// =============================================================================
// Correspondences
// =============================================================================

/**
 * 대응점 쌍
 */
export interface Correspondence {
  source: Coordinate;
  dest: Coordinate;
}

/**
 * 정확히 3개의 대응점 (순서 있음)
 *
 * i번째 source는 i번째 dest와 짝 - 내용(이름 등) 기반 매칭 없음
 * 호출자가 양쪽 기준점 순서를 맞춰야 함
 */
export type ReferenceTriplet = readonly [Correspondence, Correspondence, Correspondence];

// =============================================================================
// Transformer Interface
// =============================================================================

/**
 * 아핀 변환기 인터페이스
 */
export interface IAffineTransformer {
  /**
   * 3개 대응점으로 변환 계산
   */
  fit(correspondences: ReferenceTriplet): AffineTransform;

  /**
   * 변환 적용 (정수 픽셀로 반올림)
   */
  apply(transform: AffineTransform, point: Coordinate): Coordinate;

  /**
   * 변환 적용 (반올림 없음)
   */
  applyExact(transform: AffineTransform, point: Coordinate): Coordinate;

  /**
   * 역변환
   */
  invert(transform: AffineTransform): AffineTransform;
}

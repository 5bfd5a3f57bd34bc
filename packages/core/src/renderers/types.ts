/**
 * Point Renderer Types
 *
 * 포인트 렌더링 데이터 정의
 *
 * 포인트는 순수 데이터로 유지하고, 화면 요소는 항상 포인트 상태에서 다시 만듦
 * (화면 요소 → 포인트 방향의 갱신은 없음)
 */

import type { AnalysisPoint, Coordinate } from '../points/types';

/**
 * 포인트 렌더링 데이터 (이미지 픽셀 좌표 기반)
 */
export interface PointRenderData {
  /** 포인트 ID */
  id: number;
  /** 중심 */
  center: Coordinate;
  /** 외곽 원 반지름 (diameter * scale / 2) */
  outerRadius: number;
  /** 외곽 원 선 두께 */
  outerStrokeWidth: number;
  /** 중심 점 반지름 (스케일과 무관) */
  innerRadius: number;
  /** 라벨 텍스트 (<id>_<label>) */
  labelText: string;
  /** 라벨 위치 */
  labelPosition: Coordinate;
  /** 색상 */
  color: string;
  /** 기준점 여부 */
  isReference: boolean;
  /** 원본 포인트 참조 */
  point: AnalysisPoint;
}

/**
 * 렌더링 스타일 옵션
 */
export interface PointRenderStyle {
  outerStrokeWidth: number;
  innerRadius: number;
}

export const DEFAULT_POINT_RENDER_STYLE: Readonly<PointRenderStyle> = {
  outerStrokeWidth: 4,
  innerRadius: 0.5,
};

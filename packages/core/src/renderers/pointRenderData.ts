/**
 * Point render data
 *
 * 포인트 → 렌더링 데이터 변환
 */

import type { AnalysisPoint } from '../points/types';
import type { PointRenderData, PointRenderStyle } from './types';
import { DEFAULT_POINT_RENDER_STYLE } from './types';

/**
 * 포인트 하나의 렌더링 데이터 생성
 */
export function createPointRenderData(
  point: AnalysisPoint,
  style: PointRenderStyle = DEFAULT_POINT_RENDER_STYLE
): PointRenderData {
  return {
    id: point.id,
    center: { x: point.x, y: point.y },
    outerRadius: (point.diameter * point.scale) / 2,
    outerStrokeWidth: style.outerStrokeWidth,
    innerRadius: style.innerRadius,
    labelText: `${point.id}_${point.label}`,
    labelPosition: { x: point.x, y: point.y },
    color: point.colour,
    isReference: point.label === 'RefMark',
    point,
  };
}

/**
 * 여러 포인트의 렌더링 데이터 (삽입 순서 = 그리는 순서)
 */
export function createRenderList(
  points: AnalysisPoint[],
  style?: PointRenderStyle
): PointRenderData[] {
  return points.map((p) => createPointRenderData(p, style));
}

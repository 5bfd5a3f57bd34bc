/**
 * Point renderers
 *
 * 포인트 렌더링 데이터 - 실제 그리기(SVG, Canvas 등)는 UI 쪽에서 구현
 */

export * from './types';
export { createPointRenderData, createRenderList } from './pointRenderData';

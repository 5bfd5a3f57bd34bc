/**
 * Points Module
 *
 * 분석 포인트 모델 + Registry
 */

export * from './types';
export * from './errors';
export { resolvePointSettings, validatePointFields, createPointInput } from './settings';
export { PointRegistry, REQUIRED_REFERENCE_POINTS } from './PointRegistry';
export type { PointRegistryOptions } from './PointRegistry';

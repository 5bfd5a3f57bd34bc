/**
 * Scale 유틸리티
 *
 * 사용자가 그린 기준선과 입력한 실제 거리로 스케일(pixels / µm) 계산
 * 자동 보정은 하지 않음 - 거리 값은 항상 사용자가 제공
 */

import type { Coordinate } from '../points/types';
import { PointEngineError } from '../points/errors';

/**
 * 스케일 소수 자릿수
 */
const SCALE_DECIMALS = 3;

/**
 * 기준선 길이 (픽셀)
 */
export function lineLength(start: Coordinate, end: Coordinate): number {
  return Math.hypot(end.x - start.x, end.y - start.y);
}

/**
 * 스케일 계산
 *
 * @param start - 기준선 시작점 (픽셀)
 * @param end - 기준선 끝점 (픽셀)
 * @param distanceMicrons - 기준선의 실제 길이 (µm)
 * @returns pixels / µm (소수 3자리)
 * @throws PointEngineError (INVALID_SETTINGS)
 *
 * @example
 * ```typescript
 * calculateScale({ x: 0, y: 0 }, { x: 300, y: 400 }, 250); // 2
 * ```
 */
export function calculateScale(
  start: Coordinate,
  end: Coordinate,
  distanceMicrons: number
): number {
  if (!Number.isFinite(distanceMicrons) || distanceMicrons <= 0) {
    throw new PointEngineError(
      `Distance must be a positive number, got ${distanceMicrons}`,
      'INVALID_SETTINGS',
      { distanceMicrons }
    );
  }

  const pixels = lineLength(start, end);
  if (pixels === 0) {
    throw new PointEngineError(
      'The scale line has zero length: pick two different points',
      'INVALID_SETTINGS'
    );
  }

  return Number((pixels / distanceMicrons).toFixed(SCALE_DECIMALS));
}

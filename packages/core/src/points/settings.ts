/**
 * Point Settings
 *
 * 기본 설정 병합 및 포인트 필드 검증
 */

import type { PointInput, PointSettings, ValidationResult } from './types';
import { DEFAULT_POINT_SETTINGS, isPointLabel } from './types';
import { PointEngineError } from './errors';

/**
 * 부분 설정을 기본값 위에 병합
 *
 * @param overrides - 덮어쓸 설정 (선택적)
 * @returns 검증된 전체 설정
 * @throws PointEngineError (INVALID_SETTINGS, INVALID_LABEL)
 */
export function resolvePointSettings(
  overrides: Partial<PointSettings> = {}
): PointSettings {
  const settings: PointSettings = { ...DEFAULT_POINT_SETTINGS, ...overrides };

  if (!isPointLabel(settings.label)) {
    throw PointEngineError.invalidLabel(settings.label);
  }
  if (!Number.isInteger(settings.diameter) || settings.diameter <= 0) {
    throw new PointEngineError(
      `Diameter must be a positive integer, got ${settings.diameter}`,
      'INVALID_SETTINGS',
      { diameter: settings.diameter }
    );
  }
  if (!Number.isFinite(settings.scale) || settings.scale <= 0) {
    throw new PointEngineError(
      `Scale must be a positive number, got ${settings.scale}`,
      'INVALID_SETTINGS',
      { scale: settings.scale }
    );
  }

  return settings;
}

/**
 * 포인트 입력 필드 검증
 *
 * 라벨 검증은 별도 (INVALID_LABEL로 구분)
 */
export function validatePointFields(input: PointInput): ValidationResult {
  const errors: string[] = [];

  if (input.id !== undefined && (!Number.isInteger(input.id) || input.id <= 0)) {
    errors.push(`id must be a positive integer, got ${input.id}`);
  }
  if (!Number.isInteger(input.x) || !Number.isInteger(input.y)) {
    errors.push(`x and y must be integer pixel coordinates, got (${input.x}, ${input.y})`);
  }
  if (!Number.isInteger(input.diameter) || input.diameter <= 0) {
    errors.push(`diameter must be a positive integer, got ${input.diameter}`);
  }
  if (!Number.isFinite(input.scale) || input.scale <= 0) {
    errors.push(`scale must be a positive number, got ${input.scale}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings: [],
  };
}

/**
 * 설정값으로 포인트 입력 생성 (클릭 배치용)
 */
export function createPointInput(
  position: { x: number; y: number },
  settings: PointSettings,
  id?: number
): PointInput {
  return {
    id,
    label: settings.label,
    x: position.x,
    y: position.y,
    diameter: settings.diameter,
    scale: settings.scale,
    colour: settings.colour,
    sampleName: settings.sampleName,
    mountName: settings.mountName,
    material: settings.material,
    notes: settings.notes,
  };
}

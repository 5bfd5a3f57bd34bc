/**
 * Point Registry
 *
 * 분석 포인트 저장소
 *
 * 책임:
 * - 삽입 순서 유지 (export 순서, "최근 추가 우선" 선택)
 * - ID 할당 (세션 동안 재사용하지 않음, resetIds 제외)
 * - 라벨/필드 검증
 * - 기준점(RefMark) 부분집합 제공
 */

import type {
  AnalysisPoint,
  PointInput,
  PointMetadataPatch,
  ValidationResult,
} from './types';
import { DEFAULT_POINT_SETTINGS, isPointLabel } from './types';
import { PointEngineError } from './errors';
import { validatePointFields } from './settings';
import { createLogger } from '../utils/logger';

const log = createLogger('PointRegistry');

/**
 * 재좌표화에 필요한 최소 기준점 개수
 */
export const REQUIRED_REFERENCE_POINTS = 3;

// =============================================================================
// Point Registry Options
// =============================================================================

/**
 * PointRegistry 옵션
 */
export interface PointRegistryOptions {
  /** 변경 콜백 (모든 변경 후 현재 포인트 목록 전달) */
  onChange?: (points: AnalysisPoint[]) => void;
}

// =============================================================================
// Point Registry
// =============================================================================

/**
 * 분석 포인트 저장소
 *
 * 한 편집 세션 동안 하나의 Registry를 사용
 */
export class PointRegistry {
  /** ID → 포인트 (Map은 삽입 순서를 유지) */
  private points: Map<number, AnalysisPoint> = new Map();

  /** 다음 할당 ID */
  private nextPointId = 1;

  /** 변경 콜백 */
  private onChange?: (points: AnalysisPoint[]) => void;

  constructor(options: PointRegistryOptions = {}) {
    this.onChange = options.onChange;
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  /**
   * 포인트 추가 (끝에 삽입)
   *
   * @param input - 포인트 입력 (id 없으면 nextId 할당)
   * @returns 저장된 포인트
   * @throws PointEngineError (INVALID_LABEL, INVALID_POINT, DUPLICATE_ID)
   */
  add(input: PointInput): AnalysisPoint {
    const point = this.preparePoint(input, new Set());
    this.insert(point);
    this.notifyChange();

    log.debug('Added analysis point', point.id);
    return point;
  }

  /**
   * 여러 포인트 일괄 추가 (Import, 재좌표화용)
   *
   * 전부 검증한 뒤 삽입 - 하나라도 실패하면 아무것도 추가하지 않음
   *
   * @param inputs - 추가할 포인트들
   * @returns 저장된 포인트들 (입력 순서)
   */
  addBulk(inputs: PointInput[]): AnalysisPoint[] {
    const pendingIds = new Set<number>();
    let provisionalNextId = this.nextPointId;
    const prepared: AnalysisPoint[] = [];

    for (const input of inputs) {
      const id = input.id ?? provisionalNextId;
      const point = this.preparePoint({ ...input, id }, pendingIds);
      pendingIds.add(point.id);
      provisionalNextId = Math.max(provisionalNextId, point.id + 1);
      prepared.push(point);
    }

    for (const point of prepared) {
      this.insert(point);
    }

    if (prepared.length > 0) {
      this.notifyChange();
    }

    return prepared;
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  /**
   * ID로 포인트 조회
   *
   * @throws PointEngineError (NOT_FOUND)
   */
  lookup(id: number): AnalysisPoint {
    const point = this.points.get(id);
    if (!point) {
      throw PointEngineError.notFound(id);
    }
    return point;
  }

  /**
   * ID로 포인트 조회 (없으면 undefined)
   */
  get(id: number): AnalysisPoint | undefined {
    return this.points.get(id);
  }

  /**
   * 모든 포인트 (삽입 순서)
   */
  getAll(): AnalysisPoint[] {
    return Array.from(this.points.values());
  }

  /**
   * 기준점 (RefMark) 목록 (삽입 순서)
   */
  referencePoints(): AnalysisPoint[] {
    return this.getAll().filter((p) => p.label === 'RefMark');
  }

  /**
   * 주어진 좌표에 있는 가장 최근 포인트
   *
   * 겹친 포인트가 있으면 나중에 추가된 것이 선택됨
   * 반경 = diameter * scale / 2 (화면상 외곽 원)
   */
  findAt(x: number, y: number): AnalysisPoint | undefined {
    const all = this.getAll();
    for (let i = all.length - 1; i >= 0; i--) {
      const point = all[i];
      const radius = (point.diameter * point.scale) / 2;
      const dx = x - point.x;
      const dy = y - point.y;
      if (dx * dx + dy * dy <= radius * radius) {
        return point;
      }
    }
    return undefined;
  }

  /** 포인트 개수 */
  get count(): number {
    return this.points.size;
  }

  /** 다음 할당 ID */
  get nextId(): number {
    return this.nextPointId;
  }

  // ---------------------------------------------------------------------------
  // Update
  // ---------------------------------------------------------------------------

  /**
   * 메타데이터 수정 (테이블 편집)
   *
   * ID, 좌표, 직경, 스케일, 색상은 수정 불가
   *
   * @throws PointEngineError (NOT_FOUND, INVALID_LABEL)
   */
  update(id: number, patch: PointMetadataPatch): AnalysisPoint {
    const point = this.lookup(id);

    if (patch.label !== undefined && !isPointLabel(patch.label)) {
      log.warn(`Rejected label for point ${id}:`, patch.label);
      throw PointEngineError.invalidLabel(patch.label);
    }

    const updated: AnalysisPoint = {
      ...point,
      label: patch.label ?? point.label,
      sampleName: patch.sampleName ?? point.sampleName,
      mountName: patch.mountName ?? point.mountName,
      material: patch.material ?? point.material,
      notes: patch.notes ?? point.notes,
    };

    this.points.set(id, updated);
    this.notifyChange();

    return updated;
  }

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  /**
   * 포인트 삭제
   *
   * @returns 삭제된 포인트
   * @throws PointEngineError (NOT_FOUND)
   */
  remove(id: number): AnalysisPoint {
    const point = this.points.get(id);
    if (!point) {
      log.warn('Analysis point not found:', id);
      throw PointEngineError.notFound(id);
    }

    this.points.delete(id);
    this.notifyChange();

    return point;
  }

  /**
   * 모든 포인트 삭제
   *
   * ID 카운터는 유지됨
   */
  clear(): void {
    this.points.clear();
    this.notifyChange();
  }

  /**
   * ID 재할당
   *
   * 기존 ID 오름차순으로 1부터 다시 번호를 매김 (되돌릴 수 없음)
   * 삽입 순서는 유지, nextId = 최대 ID + 1
   */
  resetIds(): void {
    const ascending = Array.from(this.points.keys()).sort((a, b) => a - b);
    const renumbered = new Map<number, number>();
    ascending.forEach((oldId, index) => renumbered.set(oldId, index + 1));

    const next = new Map<number, AnalysisPoint>();
    for (const point of this.points.values()) {
      const id = renumbered.get(point.id) ?? point.id;
      next.set(id, { ...point, id });
    }

    this.points = next;
    this.nextPointId = ascending.length + 1;
    this.notifyChange();
  }

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------

  /**
   * Export 전 데이터 검증
   *
   * - 포인트 없음: 에러
   * - 기준점 3개 미만: 경고
   * - 기본 스케일 그대로인 포인트: 경고
   */
  validateForExport(): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.points.size === 0) {
      errors.push('There are no analysis points to export');
    }

    const referenceCount = this.referencePoints().length;
    if (this.points.size > 0 && referenceCount < REQUIRED_REFERENCE_POINTS) {
      warnings.push(
        `Missing reference points: there must be at least ${REQUIRED_REFERENCE_POINTS} points labelled 'RefMark' (found ${referenceCount})`
      );
    }

    const unscaled = this.getAll().filter(
      (p) => p.scale === DEFAULT_POINT_SETTINGS.scale
    );
    if (unscaled.length > 0) {
      warnings.push(
        `A scale value has not been set for ${unscaled.length} point(s)`
      );
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * 입력 검증 및 포인트 생성 (저장하지 않음)
   */
  private preparePoint(input: PointInput, pendingIds: Set<number>): AnalysisPoint {
    if (!isPointLabel(input.label)) {
      log.warn('Rejected label:', input.label);
      throw PointEngineError.invalidLabel(input.label);
    }

    const validation = validatePointFields(input);
    if (!validation.valid) {
      throw new PointEngineError(
        `Invalid analysis point: ${validation.errors.join('; ')}`,
        'INVALID_POINT',
        { errors: validation.errors }
      );
    }

    const id = input.id ?? this.nextPointId;
    if (this.points.has(id) || pendingIds.has(id)) {
      throw new PointEngineError(
        `Analysis point ID already exists: ${id}`,
        'DUPLICATE_ID',
        { id }
      );
    }

    return {
      id,
      label: input.label,
      x: input.x,
      y: input.y,
      diameter: input.diameter,
      scale: input.scale,
      colour: input.colour,
      sampleName: input.sampleName,
      mountName: input.mountName,
      material: input.material,
      notes: input.notes,
    };
  }

  /**
   * 포인트 저장 및 ID 카운터 갱신
   */
  private insert(point: AnalysisPoint): void {
    this.points.set(point.id, point);
    this.nextPointId = Math.max(this.nextPointId, point.id + 1);
  }

  /**
   * 변경 알림
   */
  private notifyChange(): void {
    if (this.onChange) {
      this.onChange(this.getAll());
    }
  }
}

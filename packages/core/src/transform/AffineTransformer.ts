/**
 * Affine Transformer
 *
 * 기준점 3쌍으로 아핀 변환을 계산하고 임의의 점에 적용
 *
 * 책임:
 * - 6원 연립방정식 풀이 (source 행렬을 공유하는 3x3 시스템 2개, 크래머 공식)
 * - 일직선/중복 기준점 검출
 * - 정수 픽셀 반올림 (0에서 먼 쪽으로)
 *
 * 단위 변환은 하지 않음 - 양쪽 모두 픽셀 좌표 그대로 사용
 */

import type { Coordinate } from '../points/types';
import { PointEngineError } from '../points/errors';
import type {
  AffineTransform,
  Correspondence,
  IAffineTransformer,
  ReferenceTriplet,
} from './types';

/**
 * 일직선 판정 허용 오차 (source 범위 제곱에 대한 비율)
 */
const COLLINEAR_TOLERANCE = 1e-9;

/**
 * 0에서 먼 쪽으로 반올림 (2.5 → 3, -2.5 → -3)
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  // -0 정규화
  return rounded === 0 ? 0 : rounded;
}

function degenerate(message: string, details: Record<string, unknown> = {}): PointEngineError {
  return new PointEngineError(message, 'DEGENERATE_REFERENCE_SET', details);
}

// =============================================================================
// Affine Transformer
// =============================================================================

/**
 * 아핀 변환기
 */
export class AffineTransformer implements IAffineTransformer {
  // ---------------------------------------------------------------------------
  // Fitting
  // ---------------------------------------------------------------------------

  /**
   * 3개 대응점으로 변환 계산
   *
   * T(source_i) = dest_i (i = 1..3)
   *
   * @throws PointEngineError (DEGENERATE_REFERENCE_SET) source가 일직선이거나 중복일 때
   */
  fit(correspondences: ReferenceTriplet): AffineTransform {
    const [p1, p2, p3] = correspondences.map((c) => c.source);
    const [q1, q2, q3] = correspondences.map((c) => c.dest);

    const values = [p1, p2, p3, q1, q2, q3].flatMap((p) => [p.x, p.y]);
    if (!values.every(Number.isFinite)) {
      throw degenerate('Reference point coordinates must be finite numbers');
    }

    // 1. source 행렬 [[x, y, 1] x 3]의 행렬식 (삼각형 면적의 2배)
    const det =
      p1.x * (p2.y - p3.y) + p2.x * (p3.y - p1.y) + p3.x * (p1.y - p2.y);

    // 2. 범위 기준 상대 오차로 일직선 판정
    const xs = [p1.x, p2.x, p3.x];
    const ys = [p1.y, p2.y, p3.y];
    const span = Math.max(
      Math.max(...xs) - Math.min(...xs),
      Math.max(...ys) - Math.min(...ys)
    );
    if (span === 0 || Math.abs(det) <= COLLINEAR_TOLERANCE * span * span) {
      throw degenerate(
        'Reference points are collinear or coincident: no unique affine transform exists',
        { sources: [p1, p2, p3] }
      );
    }

    // 3. 크래머 공식 - x'와 y' 각각 (계수 2개 + 이동량)
    const solve = (r1: number, r2: number, r3: number): [number, number, number] => [
      (r1 * (p2.y - p3.y) + r2 * (p3.y - p1.y) + r3 * (p1.y - p2.y)) / det,
      (r1 * (p3.x - p2.x) + r2 * (p1.x - p3.x) + r3 * (p2.x - p1.x)) / det,
      (r1 * (p2.x * p3.y - p3.x * p2.y) +
        r2 * (p3.x * p1.y - p1.x * p3.y) +
        r3 * (p1.x * p2.y - p2.x * p1.y)) /
        det,
    ];

    const [a, b, tx] = solve(q1.x, q2.x, q3.x);
    const [c, d, ty] = solve(q1.y, q2.y, q3.y);

    return { a, b, c, d, tx, ty };
  }

  // ---------------------------------------------------------------------------
  // Application
  // ---------------------------------------------------------------------------

  /**
   * 변환 적용 (정수 픽셀)
   */
  apply(transform: AffineTransform, point: Coordinate): Coordinate {
    const exact = this.applyExact(transform, point);
    return {
      x: roundHalfAwayFromZero(exact.x),
      y: roundHalfAwayFromZero(exact.y),
    };
  }

  /**
   * 변환 적용 (반올림 없음)
   */
  applyExact(transform: AffineTransform, point: Coordinate): Coordinate {
    const { a, b, c, d, tx, ty } = transform;
    return {
      x: a * point.x + b * point.y + tx,
      y: c * point.x + d * point.y + ty,
    };
  }

  /**
   * 역변환 (destination → source)
   *
   * @throws PointEngineError (DEGENERATE_REFERENCE_SET) 선형 부분이 특이행렬일 때
   */
  invert(transform: AffineTransform): AffineTransform {
    const { a, b, c, d, tx, ty } = transform;
    const det = a * d - b * c;

    if (!Number.isFinite(det) || det === 0) {
      throw degenerate('Transform is not invertible');
    }

    const ia = d / det;
    const ib = -b / det;
    const ic = -c / det;
    const id = a / det;

    return {
      a: ia,
      b: ib,
      c: ic,
      d: id,
      tx: -(ia * tx + ib * ty),
      ty: -(ic * tx + id * ty),
    };
  }
}

// =============================================================================
// Correspondence Selection
// =============================================================================

/**
 * 양쪽 기준점 목록에서 앞의 3개씩 짝지음
 *
 * 3개를 넘는 기준점은 무시 (평균내지 않음)
 *
 * @throws PointEngineError (INSUFFICIENT_REFERENCE_POINTS)
 */
export function pairReferencePoints(
  sources: Coordinate[],
  dests: Coordinate[]
): ReferenceTriplet {
  if (sources.length < 3 || dests.length < 3) {
    throw new PointEngineError(
      `At least 3 reference points are required on each side (source: ${sources.length}, destination: ${dests.length})`,
      'INSUFFICIENT_REFERENCE_POINTS',
      { sourceCount: sources.length, destCount: dests.length }
    );
  }

  const pair = (i: number): Correspondence => ({
    source: { x: sources[i].x, y: sources[i].y },
    dest: { x: dests[i].x, y: dests[i].y },
  });

  return [pair(0), pair(1), pair(2)];
}

// =============================================================================
// Singleton Export
// =============================================================================

/**
 * 기본 아핀 변환기 인스턴스
 */
export const affineTransformer = new AffineTransformer();
